export enum ZibalTransactionStatus {
  Pending = -1,
  InternalError = -2,
  PaidVerified = 1,
  PaidUnverified = 2,
  CancelledByUser = 3,
  InvalidCardNumber = 4,
  InsufficientBalance = 5,
  WrongPassword = 6,
  TooManyRequests = 7,
  DailyPaymentCountExceeded = 8,
  DailyPaymentAmountExceeded = 9,
  InvalidCardIssuer = 10,
  SwitchError = 11,
  CardNotAccessible = 12,
}
