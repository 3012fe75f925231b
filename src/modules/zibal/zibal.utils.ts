import { ZIBAL_TEST_MERCHANT } from './zibal.constants';

export const resolveMerchant = (merchant: string, isTest: boolean): string =>
  isTest ? ZIBAL_TEST_MERCHANT : merchant;
