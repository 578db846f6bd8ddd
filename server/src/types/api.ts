export interface ApiResponse<T> {
    success: true;
    data: T;
    warning?: string;
}

export interface ApiErrorResponse {
    success: false;
    error: {
        code: string;
        message: string;
        details?: unknown;
    };
}

export interface Paginated<T> {
    data: T[];
    meta: {
        total: number;
        page: number;
        limit: number;
        totalPages: number;
    };
}

export function successResponse<T>(data: T, warning?: string): ApiResponse<T> {
    const response: ApiResponse<T> = { success: true, data };
    if (warning) {
        response.warning = warning;
    }
    return response;
}
