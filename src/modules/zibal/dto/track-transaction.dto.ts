import { trimText } from '@/shared/utils/normalize.util';
import { ZibalTrackTransactionBody } from '../zibal.interface';
import { resolveMerchant } from '../zibal.utils';

export interface TrackTransactionInit {
  merchant: string;
  /** Issued by the gateway when the transaction was created. */
  trackId: number;
  isTest?: boolean;
}

/** Shape shared by verify and inquiry calls, which only point at an existing transaction. */
export abstract class TrackTransactionRequest {
  readonly merchant: string;
  readonly trackId: number;
  readonly isTest: boolean;

  constructor(init: TrackTransactionInit) {
    this.merchant = trimText(init.merchant);
    this.trackId = init.trackId;
    this.isTest = init.isTest ?? false;
  }

  get transmittedMerchant(): string {
    return resolveMerchant(this.merchant, this.isTest);
  }

  toInit(): TrackTransactionInit {
    return {
      merchant: this.merchant,
      trackId: this.trackId,
      isTest: this.isTest,
    };
  }

  toPayload(): ZibalTrackTransactionBody {
    return {
      merchant: this.transmittedMerchant,
      trackId: this.trackId,
    };
  }
}

export class VerifyTransactionRequest extends TrackTransactionRequest {
  with(changes: Partial<TrackTransactionInit>): VerifyTransactionRequest {
    return new VerifyTransactionRequest({ ...this.toInit(), ...changes });
  }
}

export class InquiryTransactionRequest extends TrackTransactionRequest {
  with(changes: Partial<TrackTransactionInit>): InquiryTransactionRequest {
    return new InquiryTransactionRequest({ ...this.toInit(), ...changes });
  }
}
