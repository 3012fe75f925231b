/** Who pays the gateway fee of a multiplexed transaction. */
export enum FeeMode {
  FromTransaction = 0,
  FromWallet = 1,
  PaidByPayer = 2,
}
