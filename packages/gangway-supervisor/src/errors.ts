export type SupervisorErrorCode =
  | 'ILLEGAL_TRANSITION'
  | 'ALREADY_STARTED'
  | 'NOT_STARTED'
  | 'UNKNOWN_HANDLE';

export class SupervisorError extends Error {
  code: SupervisorErrorCode;

  constructor(message: string, code: SupervisorErrorCode) {
    super(message);
    this.name = 'SupervisorError';
    this.code = code;
  }
}

export class SupervisorConfigError extends Error {
  code: string;

  constructor(message: string, code: string = 'SUPERVISOR_MISCONFIGURED') {
    super(message);
    this.name = 'SupervisorConfigError';
    this.code = code;
  }
}
