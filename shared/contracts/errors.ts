export type ApiErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "CONFLICT" | "INTERNAL_ERROR";

export type ApiErrorBody = {
  message: string;
  code?: ApiErrorCode;
  errors?: Record<string, string[] | undefined>;
};
