export interface ApiResponse<T> {
  data: T;
  meta: ResponseMeta | null;
  errors: ApiError[] | null;
}

export interface ResponseMeta {
  total: number;
}

export interface ApiError {
  code: string;
  field: string | null;
  message: string;
}
