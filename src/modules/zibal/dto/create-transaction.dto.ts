import { trimList, trimOptional, trimText } from '@/shared/utils/normalize.util';
import { FeeMode } from '../enums/fee-mode.enum';
import { PercentMode } from '../enums/percent-mode.enum';
import { ZibalModeMapper } from '../mappers/mode.mapper';
import { ZibalCreateAdvancedTransactionBody, ZibalCreateTransactionBody } from '../zibal.interface';
import { resolveMerchant } from '../zibal.utils';
import { MultiplexingInformation, MultiplexingInformationInit } from './multiplexing-info.dto';

export interface CreateTransactionInit {
  merchant: string;
  /** Rials. */
  amount: number;
  callbackUrl: string;
  description?: string;
  /** Merchant-side order id, shown in gateway reports. */
  orderId?: string;
  /** Lets the payer pick from the cards registered to this number. */
  mobile?: string;
  /** Card numbers the payer is restricted to. */
  allowedCards?: readonly string[];
  /** A successful payment is credited to this ledger. */
  ledgerId?: string;
  /** 10 digit national code; the payment is aborted unless the card holder matches. */
  nationalCode?: string;
  checkMobileWithCard?: boolean;
  isTest?: boolean;
}

export class CreateTransactionRequest {
  /** The merchant as given. See `transmittedMerchant` for what is sent. */
  readonly merchant: string;
  readonly isTest: boolean;
  readonly amount: number;
  readonly callbackUrl: string;
  readonly description?: string;
  readonly orderId?: string;
  readonly mobile?: string;
  readonly allowedCards?: readonly string[];
  readonly ledgerId?: string;
  readonly nationalCode?: string;
  readonly checkMobileWithCard: boolean;

  constructor(init: CreateTransactionInit) {
    this.merchant = trimText(init.merchant);
    this.isTest = init.isTest ?? false;
    this.amount = init.amount;
    this.callbackUrl = trimText(init.callbackUrl);
    this.description = trimOptional(init.description);
    this.orderId = trimOptional(init.orderId);
    this.mobile = trimOptional(init.mobile);
    this.allowedCards = trimList(init.allowedCards);
    this.ledgerId = trimOptional(init.ledgerId);
    this.nationalCode = trimOptional(init.nationalCode);
    this.checkMobileWithCard = init.checkMobileWithCard ?? false;
  }

  get transmittedMerchant(): string {
    return resolveMerchant(this.merchant, this.isTest);
  }

  /** Returns a normalized copy with `changes` applied. */
  with(changes: Partial<CreateTransactionInit>): CreateTransactionRequest {
    return new CreateTransactionRequest({ ...this.toInit(), ...changes });
  }

  toInit(): CreateTransactionInit {
    return {
      merchant: this.merchant,
      amount: this.amount,
      callbackUrl: this.callbackUrl,
      description: this.description,
      orderId: this.orderId,
      mobile: this.mobile,
      allowedCards: this.allowedCards,
      ledgerId: this.ledgerId,
      nationalCode: this.nationalCode,
      checkMobileWithCard: this.checkMobileWithCard,
      isTest: this.isTest,
    };
  }

  toPayload(): ZibalCreateTransactionBody {
    return {
      merchant: this.transmittedMerchant,
      amount: this.amount,
      callbackUrl: this.callbackUrl,
      description: this.description,
      orderId: this.orderId,
      mobile: this.mobile,
      allowedCards: this.allowedCards ? [...this.allowedCards] : undefined,
      ledgerId: this.ledgerId,
      nationalCode: this.nationalCode,
      checkMobileWithCard: this.checkMobileWithCard,
    };
  }
}

export interface CreateAdvancedTransactionInit extends CreateTransactionInit {
  percentMode?: PercentMode;
  feeMode?: FeeMode;
  /** Beneficiaries, in the order the gateway should settle them. */
  multiplexingInfos: readonly (MultiplexingInformation | MultiplexingInformationInit)[];
}

/**
 * Transaction split between several beneficiaries.
 *
 * `percentMode` and `feeMode` are checked on construction and on every `with()`,
 * throwing `InvalidArgumentException` for values outside their enum.
 */
export class CreateAdvancedTransactionRequest extends CreateTransactionRequest {
  readonly percentMode: PercentMode;
  readonly feeMode: FeeMode;
  readonly multiplexingInfos: readonly MultiplexingInformation[];

  constructor(init: CreateAdvancedTransactionInit) {
    super(init);
    this.percentMode = ZibalModeMapper.toPercentMode(init.percentMode ?? PercentMode.Amount);
    this.feeMode = ZibalModeMapper.toFeeMode(init.feeMode ?? FeeMode.FromTransaction);
    this.multiplexingInfos = init.multiplexingInfos.map((info) => MultiplexingInformation.from(info));
  }

  with(changes: Partial<CreateAdvancedTransactionInit>): CreateAdvancedTransactionRequest {
    return new CreateAdvancedTransactionRequest({ ...this.toInit(), ...changes });
  }

  toInit(): CreateAdvancedTransactionInit {
    return {
      ...super.toInit(),
      percentMode: this.percentMode,
      feeMode: this.feeMode,
      multiplexingInfos: this.multiplexingInfos,
    };
  }

  toPayload(): ZibalCreateAdvancedTransactionBody {
    return {
      ...super.toPayload(),
      percentMode: this.percentMode,
      feeMode: this.feeMode,
      multiplexingInfos: this.multiplexingInfos.map((info) => info.toPayload()),
    };
  }
}
