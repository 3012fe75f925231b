import { HttpService } from '@nestjs/axios';
import { Injectable } from '@nestjs/common';
import { ClassConstructor } from 'class-transformer';
import { AppConfigService } from '@/shared/services/config.service';
import { LoggerService } from '@/shared/services/logger.service';
import {
  CreateAdvancedTransactionResponse,
  CreateTransactionRequest,
  CreateTransactionResponse,
  InquiryAdvancedTransactionResponse,
  InquiryTransactionRequest,
  InquiryTransactionResponse,
  VerifyAdvancedTransactionResponse,
  VerifyTransactionRequest,
  VerifyTransactionResponse,
  ZibalResponse,
} from './dto';
import { ZibalPayloadMapper } from './mappers/payload.mapper';
import { ZIBAL_CONTENT_TYPE, ZIBAL_START_PATH, ZibalEndpoint } from './zibal.constants';

/**
 * Client for the Zibal payment gateway.
 *
 * Every call is a single POST with no retry. Transport errors surface as thrown by
 * axios, a body that cannot be read as the expected reply raises
 * `DeserializationException`, and gateway refusals come back as ordinary responses
 * carrying `result` and `message`.
 */
@Injectable()
export class ZibalClient {
  private readonly baseUrl: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: AppConfigService,
    private readonly logger: LoggerService,
  ) {
    this.baseUrl = this.configService.zibalConfig.baseUrl;
  }

  /**
   * Starts a transaction. On success, send the payer to `buildPaymentUrl(trackId)`.
   *
   * @param isLazy use the lazy endpoint, which reports back to the callback URL with a JSON body
   * @param isAdvanced read the reply as a multiplexed one
   */
  requestTransaction(
    request: CreateTransactionRequest,
    isLazy?: boolean,
    isAdvanced?: false,
  ): Promise<CreateTransactionResponse>;
  requestTransaction(
    request: CreateTransactionRequest,
    isLazy: boolean,
    isAdvanced: true,
  ): Promise<CreateAdvancedTransactionResponse>;
  requestTransaction(
    request: CreateTransactionRequest,
    isLazy?: boolean,
    isAdvanced?: boolean,
  ): Promise<CreateTransactionResponse>;
  async requestTransaction(
    request: CreateTransactionRequest,
    isLazy = false,
    isAdvanced = false,
  ): Promise<CreateTransactionResponse> {
    const endpoint = isLazy ? ZibalEndpoint.LazyRequest : ZibalEndpoint.Request;
    return isAdvanced
      ? this.post(endpoint, request.toPayload(), CreateAdvancedTransactionResponse)
      : this.post(endpoint, request.toPayload(), CreateTransactionResponse);
  }

  verifyTransaction(
    request: VerifyTransactionRequest,
    isAdvanced?: false,
  ): Promise<VerifyTransactionResponse>;
  verifyTransaction(
    request: VerifyTransactionRequest,
    isAdvanced: true,
  ): Promise<VerifyAdvancedTransactionResponse>;
  verifyTransaction(
    request: VerifyTransactionRequest,
    isAdvanced?: boolean,
  ): Promise<VerifyTransactionResponse>;
  async verifyTransaction(
    request: VerifyTransactionRequest,
    isAdvanced = false,
  ): Promise<VerifyTransactionResponse> {
    return isAdvanced
      ? this.post(ZibalEndpoint.Verify, request.toPayload(), VerifyAdvancedTransactionResponse)
      : this.post(ZibalEndpoint.Verify, request.toPayload(), VerifyTransactionResponse);
  }

  getTransactionStatus(
    request: InquiryTransactionRequest,
    isAdvanced?: false,
  ): Promise<InquiryTransactionResponse>;
  getTransactionStatus(
    request: InquiryTransactionRequest,
    isAdvanced: true,
  ): Promise<InquiryAdvancedTransactionResponse>;
  getTransactionStatus(
    request: InquiryTransactionRequest,
    isAdvanced?: boolean,
  ): Promise<InquiryTransactionResponse>;
  async getTransactionStatus(
    request: InquiryTransactionRequest,
    isAdvanced = false,
  ): Promise<InquiryTransactionResponse> {
    return isAdvanced
      ? this.post(ZibalEndpoint.Inquiry, request.toPayload(), InquiryAdvancedTransactionResponse)
      : this.post(ZibalEndpoint.Inquiry, request.toPayload(), InquiryTransactionResponse);
  }

  buildPaymentUrl(trackId: number): string {
    return `${this.baseUrl}${ZIBAL_START_PATH}/${trackId}`;
  }

  private async post<T extends ZibalResponse>(
    endpoint: ZibalEndpoint,
    body: object,
    responseType: ClassConstructor<T>,
  ): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    this.logger.debug(`POST ${url}`, ZibalClient.name);

    // Non-2xx replies carry the same JSON shape, so every status is read alike.
    const res = await this.httpService.axiosRef.post<string>(url, body, {
      headers: {
        'Content-Type': ZIBAL_CONTENT_TYPE,
      },
      responseType: 'text',
      transformResponse: (data: string) => data,
      validateStatus: () => true,
    });

    const response = ZibalPayloadMapper.fromBody(responseType, res.data);
    this.logger.debug(
      `POST ${url} -> ${res.status}, result=${response.result} (${response.message})`,
      ZibalClient.name,
    );

    return response;
  }
}
