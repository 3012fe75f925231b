import { applyDecorators } from '@nestjs/common';
import { Expose, Type } from 'class-transformer';
import {
  IsArray,
  IsDate,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Trim } from '@/common/decorators/trim.decorator';
import { ZibalResultCode } from '../enums/result-code.enum';
import { MultiplexingInformation } from './multiplexing-info.dto';

const MultiplexingList = () =>
  applyDecorators(
    Expose(),
    IsArray(),
    ValidateNested({ each: true }),
    Type(() => MultiplexingInformation),
  );

const Timestamp = () => applyDecorators(Expose(), IsOptional(), Type(() => Date), IsDate());

/**
 * Fields every gateway reply carries. A business failure is reported here and
 * nowhere else: check `result` (or `succeeded`) after each call.
 */
export class ZibalResponse {
  @Expose()
  @IsInt()
  result!: number;

  @Expose()
  @IsString()
  message!: string;

  get succeeded(): boolean {
    return this.result === ZibalResultCode.Success;
  }
}

export class CreateTransactionResponse extends ZibalResponse {
  /** Absent when the gateway refused the request. */
  @Expose()
  @IsOptional()
  @IsInt()
  trackId?: number;
}

export class CreateAdvancedTransactionResponse extends CreateTransactionResponse {
  @MultiplexingList()
  multiplexingInfos: MultiplexingInformation[] = [];
}

export class VerifyTransactionResponse extends ZibalResponse {
  @Timestamp()
  paidAt?: Date;

  /** Masked, e.g. `62741****44`. */
  @Expose()
  @IsOptional()
  @IsString()
  cardNumber?: string;

  /** One of `ZibalTransactionStatus`. */
  @Expose()
  @IsOptional()
  @IsInt()
  status?: number;

  @Expose()
  @IsOptional()
  @IsInt()
  amount?: number;

  /** Only set for successful payments. */
  @Expose()
  @IsOptional()
  @IsInt()
  refNumber?: number | null;

  @Expose()
  @IsOptional()
  @IsString()
  description?: string | null;

  @Expose()
  @Trim()
  @IsOptional()
  @IsString()
  orderId?: string;
}

export class VerifyAdvancedTransactionResponse extends VerifyTransactionResponse {
  @MultiplexingList()
  multiplexingInfos: MultiplexingInformation[] = [];
}

export class InquiryTransactionResponse extends VerifyTransactionResponse {
  @Timestamp()
  createdAt?: Date;

  @Timestamp()
  verifiedAt?: Date;

  /** Who paid the fee, as a `FeeMode` value. */
  @Expose()
  @IsOptional()
  @IsInt()
  wage?: number;
}

export class InquiryAdvancedTransactionResponse extends InquiryTransactionResponse {
  @MultiplexingList()
  multiplexingInfos: MultiplexingInformation[] = [];
}
