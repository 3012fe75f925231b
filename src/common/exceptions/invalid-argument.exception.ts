import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { ZibalException } from './zibal.exception';

/** Raised synchronously when a range-checked field is given a value outside its set. */
export class InvalidArgumentException extends ZibalException {
  constructor(
    public readonly argument: string,
    message: string,
  ) {
    super(ErrorCodeEnum.InvalidArgument, message);
  }
}
