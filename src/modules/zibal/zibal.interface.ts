/**
 * Zibal request bodies as they go on the wire.
 * Docs: https://help.zibal.ir/IPG/API/
 */

export interface ZibalMultiplexingItem {
  bankAccount?: string;
  subMerchantId?: string;
  walletId?: string;
  amount: number;
  wagePayer: boolean;
}

export interface ZibalCreateTransactionBody {
  merchant: string;
  amount: number;
  callbackUrl: string;
  description?: string;
  orderId?: string;
  mobile?: string;
  allowedCards?: string[];
  ledgerId?: string;
  nationalCode?: string;
  checkMobileWithCard: boolean;
}

export interface ZibalCreateAdvancedTransactionBody extends ZibalCreateTransactionBody {
  percentMode: number;
  feeMode: number;
  multiplexingInfos: ZibalMultiplexingItem[];
}

export interface ZibalTrackTransactionBody {
  merchant: string;
  trackId: number;
}

/** Standard-mode callback arrives as query parameters, always as strings. */
export type ZibalCallbackQuery =
  | URLSearchParams
  | Record<string, string | readonly string[] | undefined>;
