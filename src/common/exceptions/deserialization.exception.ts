import { ValidationError } from 'class-validator';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { ZibalException } from './zibal.exception';

export class DeserializationException extends ZibalException {
  constructor(
    message: string,
    public readonly details: ValidationError[] = [],
    options?: ErrorOptions,
  ) {
    super(ErrorCodeEnum.Deserialization, message, options);
  }
}
