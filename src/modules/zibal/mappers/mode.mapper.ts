import { InvalidArgumentException } from '@/common/exceptions';
import { FeeMode } from '../enums/fee-mode.enum';
import { PercentMode } from '../enums/percent-mode.enum';

export class ZibalModeMapper {
  private static percentModes = new Map<number, PercentMode>([
    [PercentMode.Amount, PercentMode.Amount],
    [PercentMode.Percent, PercentMode.Percent],
  ]);

  private static feeModes = new Map<number, FeeMode>([
    [FeeMode.FromTransaction, FeeMode.FromTransaction],
    [FeeMode.FromWallet, FeeMode.FromWallet],
    [FeeMode.PaidByPayer, FeeMode.PaidByPayer],
  ]);

  static toPercentMode(value: number): PercentMode {
    const mode = this.percentModes.get(value);
    if (mode === undefined) {
      throw new InvalidArgumentException('percentMode', `Percent mode must be 0 or 1, got ${value}`);
    }
    return mode;
  }

  static toFeeMode(value: number): FeeMode {
    const mode = this.feeModes.get(value);
    if (mode === undefined) {
      throw new InvalidArgumentException('feeMode', `Fee mode must be 0, 1 or 2, got ${value}`);
    }
    return mode;
  }
}
