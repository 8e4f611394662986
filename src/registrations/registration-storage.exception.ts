import { ServiceUnavailableException } from '@nestjs/common';

export class RegistrationStorageException extends ServiceUnavailableException {
  readonly reason: string;

  constructor(
    readonly operation: 'prepare' | 'read' | 'write',
    readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not ${operation} registrations file ${filePath}`, {
      cause,
      description: reason,
    });
    this.reason = reason;
  }
}
