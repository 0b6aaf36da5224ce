export { GlobalExceptionFilter, type ApiErrorResponse } from "./http-exception.filter";
