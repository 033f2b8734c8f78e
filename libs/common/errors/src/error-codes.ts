export enum ErrorCode {
  // Client supplied data fails a constraint
  ValidationError = 'ValidationError',

  // Storage or backend failure
  InternalError = 'InternalError',
}
