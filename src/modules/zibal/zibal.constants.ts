export const ZIBAL_BASE_URL = 'https://gateway.zibal.ir';

/** Merchant value the gateway accepts for sandbox transactions. */
export const ZIBAL_TEST_MERCHANT = 'zibal';

export const ZIBAL_CONTENT_TYPE = 'application/json; charset=utf-8';

export const ZIBAL_START_PATH = '/start';

export enum ZibalEndpoint {
  Request = '/v1/request',
  LazyRequest = '/request/lazy',
  Verify = '/v1/verify',
  Inquiry = '/v1/inquiry',
}
