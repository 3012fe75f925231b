import { Expose } from 'class-transformer';
import { IsInt, IsOptional, IsString } from 'class-validator';
import { IntegerText } from '@/common/decorators/integer-text.decorator';
import { Trim } from '@/common/decorators/trim.decorator';

/** JSON body the gateway POSTs to the callback URL of a lazy transaction. */
export class LazyCallbackResponse {
  /** `"1"` on success, `"0"` on failure. */
  @Expose()
  @Trim()
  @IsString()
  success!: string;

  @Expose()
  @IsInt()
  trackId!: number;

  @Expose()
  @Trim()
  @IsString()
  orderId: string = '';

  /** Stays empty until the merchant verifies the transaction. */
  @Expose()
  @IsOptional()
  @IsInt()
  status?: number | null;

  @Expose()
  @Trim()
  @IsString()
  cardNumber: string = '';

  @Expose()
  @Trim()
  @IsString()
  hashedCardNumber: string = '';

  get succeeded(): boolean {
    return this.success === '1';
  }
}

/** Query string the gateway appends to the callback URL of a standard transaction. */
export class CallbackQuery {
  @Expose()
  @Trim()
  @IsString()
  success!: string;

  @Expose()
  @IntegerText()
  @IsInt()
  trackId!: number;

  @Expose()
  @Trim()
  @IsString()
  orderId: string = '';

  @Expose()
  @IsOptional()
  @IntegerText()
  @IsInt()
  status?: number;

  get succeeded(): boolean {
    return this.success === '1';
  }
}
