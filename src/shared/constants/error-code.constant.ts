export enum ErrorCodeEnum {
  InvalidArgument = 10400,

  Deserialization = 10502,
}

export const ErrorCode = Object.freeze<Record<ErrorCodeEnum, string>>({
  [ErrorCodeEnum.InvalidArgument]: 'Invalid argument',

  [ErrorCodeEnum.Deserialization]: 'Could not deserialize gateway payload',
});
