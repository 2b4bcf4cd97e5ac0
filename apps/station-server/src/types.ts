export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
}

export interface StationAPIResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    code: StationErrorCode;
    message: string;
  };
  timestamp: number;
  version: string;
}

export enum StationErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_REQUEST = 'INVALID_REQUEST',
  RESET_NOT_CONFIRMED = 'RESET_NOT_CONFIRMED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const API_VERSION = '1.0.0';

export function createResponse<T>(data: T): StationAPIResponse<T> {
  return {
    success: true,
    data,
    timestamp: Date.now(),
    version: API_VERSION,
  };
}

export function createErrorResponse(
  code: StationErrorCode,
  message: string
): StationAPIResponse<null> {
  return {
    success: false,
    error: { code, message },
    timestamp: Date.now(),
    version: API_VERSION,
  };
}
