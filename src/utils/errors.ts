export type ProvisioningErrorCode =
  | 'UNREACHABLE'
  | 'AUTH_FAILED'
  | 'PRIVILEGE_DENIED'
  | 'COMMAND_FAILED'
  | 'SETUP_TIMEOUT'
  | 'UNSUPPORTED_OS'
  | 'INTERFACE_VERIFICATION_FAILED'
  | 'INVALID_CONFIG_PATH'
  | 'PROVISIONING_FAILED';

export type ProvisioningStage =
  | 'name'
  | 'keys'
  | 'server-info'
  | 'address'
  | 'append'
  | 'restart'
  | 'artifact'
  | 'install'
  | 'configure'
  | 'remove'
  | 'block'
  | 'unblock';

export class ProvisioningError extends Error {
  constructor(
    readonly code: ProvisioningErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProvisioningError';
  }
}

export class CommandFailedError extends ProvisioningError {
  constructor(
    readonly command: string,
    readonly stderr: string,
    readonly exitCode: number | null
  ) {
    super('COMMAND_FAILED', `Command failed (exit ${exitCode ?? 'unknown'}): ${stderr.trim() || command}`);
    this.name = 'CommandFailedError';
  }
}

export class ProvisioningStageError extends ProvisioningError {
  constructor(readonly stage: ProvisioningStage, cause: unknown) {
    super('PROVISIONING_FAILED', `Provisioning failed at stage "${stage}": ${errorMessage(cause)}`, { cause });
    this.name = 'ProvisioningStageError';
  }
}

export class NotFoundError extends Error {
  constructor(entity: string, id: number | string) {
    super(`${entity} #${id} not found`);
    this.name = 'NotFoundError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, what: string) {
    super(`${what} timed out after ${timeoutMs} ms`);
    this.name = 'TimeoutError';
  }
}

/** Коды ошибок транспорта: при них удалённые изменения не начинались */
const TRANSPORT_CODES: ReadonlySet<ProvisioningErrorCode> = new Set([
  'UNREACHABLE',
  'AUTH_FAILED',
  'PRIVILEGE_DENIED',
  'SETUP_TIMEOUT'
]);

export function isTransportError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError && TRANSPORT_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Текст ошибки для пользователя вместе с исходной причиной */
export function describeError(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    const cause = errorMessage(error.cause);
    if (!message.includes(cause)) return `${message} (${cause})`;
  }
  return message;
}

export class PurchaseError extends Error {
  constructor(
    readonly reason: 'PLAN_UNAVAILABLE' | 'NO_CAPACITY',
    message: string
  ) {
    super(message);
    this.name = 'PurchaseError';
  }
}
