import { Expose } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString } from 'class-validator';
import { Trim } from '@/common/decorators/trim.decorator';
import { trimOptional } from '@/shared/utils/normalize.util';
import { ZibalMultiplexingItem } from '../zibal.interface';

export interface MultiplexingInformationInit {
  bankAccount?: string;
  subMerchantId?: string;
  walletId?: string;
  amount: number;
  wagePayer?: boolean;
}

/**
 * One beneficiary of a multiplexed transaction.
 *
 * Only one of `bankAccount`, `subMerchantId` and `walletId` should be set. This is
 * left to the caller and the gateway; nothing here checks it.
 */
export class MultiplexingInformation {
  /** SHABA number of the beneficiary. */
  @Expose()
  @Trim()
  @IsOptional()
  @IsString()
  readonly bankAccount?: string;

  @Expose()
  @Trim()
  @IsOptional()
  @IsString()
  readonly subMerchantId?: string;

  /** Not available to payment facilitators. */
  @Expose()
  @Trim()
  @IsOptional()
  @IsString()
  readonly walletId?: string;

  /** Rials, or a percentage under `PercentMode.Percent`. */
  @Expose()
  @IsInt()
  readonly amount: number = 0;

  /** Only honoured under `FeeMode.FromTransaction`; the main beneficiary pays otherwise. */
  @Expose()
  @IsBoolean()
  readonly wagePayer: boolean = false;

  constructor(init?: MultiplexingInformationInit) {
    if (init) {
      this.bankAccount = trimOptional(init.bankAccount);
      this.subMerchantId = trimOptional(init.subMerchantId);
      this.walletId = trimOptional(init.walletId);
      this.amount = init.amount;
      this.wagePayer = init.wagePayer ?? false;
    }
  }

  static from(info: MultiplexingInformation | MultiplexingInformationInit): MultiplexingInformation {
    return info instanceof MultiplexingInformation ? info : new MultiplexingInformation(info);
  }

  toPayload(): ZibalMultiplexingItem {
    return {
      bankAccount: this.bankAccount,
      subMerchantId: this.subMerchantId,
      walletId: this.walletId,
      amount: this.amount,
      wagePayer: this.wagePayer,
    };
  }
}
