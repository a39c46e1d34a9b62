export type UpdaterErrorCode =
  | "busy"
  | "invalid_input"
  | "not_found"
  | "state_missing"
  | "service_control"
  | "internal";

const STATUS_BY_CODE: Record<UpdaterErrorCode, number> = {
  busy: 409,
  invalid_input: 400,
  not_found: 404,
  state_missing: 404,
  service_control: 502,
  internal: 500
};

export class UpdaterError extends Error {
  readonly code: UpdaterErrorCode;
  readonly statusCode: number;

  constructor(message: string, code: UpdaterErrorCode = "internal") {
    super(message);
    this.name = "UpdaterError";
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}
