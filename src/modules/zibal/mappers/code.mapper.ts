import { ZibalResultCode } from '../enums/result-code.enum';
import { ZibalTransactionStatus } from '../enums/transaction-status.enum';

export class ZibalCodeMapper {
  private static resultMessages = new Map<number, string>([
    [ZibalResultCode.Success, 'Success'],
    [ZibalResultCode.MerchantNotFound, 'Merchant not found'],
    [ZibalResultCode.MerchantInactive, 'Merchant is inactive'],
    [ZibalResultCode.MerchantInvalid, 'Merchant is invalid'],
    [ZibalResultCode.AmountTooLow, 'Amount must be greater than 1,000 Rials'],
    [ZibalResultCode.InvalidCallbackUrl, 'Invalid callbackUrl (must start with http or https)'],
    [ZibalResultCode.AmountExceedsLimit, 'Amount exceeds the transaction limit'],
    [ZibalResultCode.AlreadyVerified, 'Transaction was already verified'],
    [ZibalResultCode.NotPaid, 'Order is not paid or the payment failed'],
    [ZibalResultCode.InvalidTrackId, 'Invalid trackId'],
  ]);

  private static statusMessages = new Map<number, string>([
    [ZibalTransactionStatus.Pending, 'Waiting for payment'],
    [ZibalTransactionStatus.InternalError, 'Internal error'],
    [ZibalTransactionStatus.PaidVerified, 'Paid and verified'],
    [ZibalTransactionStatus.PaidUnverified, 'Paid but not verified'],
    [ZibalTransactionStatus.CancelledByUser, 'Cancelled by user'],
    [ZibalTransactionStatus.InvalidCardNumber, 'Invalid card number'],
    [ZibalTransactionStatus.InsufficientBalance, 'Insufficient account balance'],
    [ZibalTransactionStatus.WrongPassword, 'Wrong password'],
    [ZibalTransactionStatus.TooManyRequests, 'Too many requests'],
    [ZibalTransactionStatus.DailyPaymentCountExceeded, 'Daily internet payment count exceeded'],
    [ZibalTransactionStatus.DailyPaymentAmountExceeded, 'Daily internet payment amount exceeded'],
    [ZibalTransactionStatus.InvalidCardIssuer, 'Invalid card issuer'],
    [ZibalTransactionStatus.SwitchError, 'Switch error'],
    [ZibalTransactionStatus.CardNotAccessible, 'Card is not accessible'],
  ]);

  static describeResult(code: number): string | undefined {
    return this.resultMessages.get(code);
  }

  static describeStatus(code: number): string | undefined {
    return this.statusMessages.get(code);
  }
}
