export enum ZibalResultCode {
  Success = 100,
  MerchantNotFound = 102,
  MerchantInactive = 103,
  MerchantInvalid = 104,
  AmountTooLow = 105,
  InvalidCallbackUrl = 106,
  AmountExceedsLimit = 113,
  AlreadyVerified = 201,
  NotPaid = 202,
  InvalidTrackId = 203,
}
