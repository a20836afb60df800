/** Failure kinds a request handler can hit; each one ends that request. */
export type ItemErrorCode =
  | 'malformed_identifier'
  | 'not_found'
  | 'validation_failed'
  | 'binding_failed';

const STATUS_BY_CODE: Record<ItemErrorCode, number> = {
  malformed_identifier: 400,
  not_found: 404,
  validation_failed: 400,
  binding_failed: 400,
};

export class ItemRequestError extends Error {
  readonly statusCode: number;

  constructor(
    readonly code: ItemErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ItemRequestError';
    this.statusCode = STATUS_BY_CODE[code];
  }
}

/** JSON body for every error response. */
export interface ErrorResponse {
  error: string;
}
