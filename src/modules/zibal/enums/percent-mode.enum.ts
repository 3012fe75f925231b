export enum PercentMode {
  Amount = 0,
  Percent = 1,
}
