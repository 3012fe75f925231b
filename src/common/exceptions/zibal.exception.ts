import { ErrorCode, ErrorCodeEnum } from '@/shared/constants/error-code.constant';

export class ZibalException extends Error {
  constructor(
    public readonly code: ErrorCodeEnum,
    message?: string,
    options?: ErrorOptions,
  ) {
    super(`${code} - ${message ?? ErrorCode[code]}`, options);
    this.name = new.target.name;
  }
}
