import { HttpService } from '@nestjs/axios';
import { Test } from '@nestjs/testing';
import { AxiosRequestConfig } from 'axios';
import { DeserializationException } from '@/common/exceptions';
import { AppConfigService } from '@/shared/services/config.service';
import { LoggerService } from '@/shared/services/logger.service';
import {
  CreateAdvancedTransactionRequest,
  CreateAdvancedTransactionResponse,
  CreateTransactionRequest,
  CreateTransactionResponse,
  InquiryAdvancedTransactionResponse,
  InquiryTransactionRequest,
  InquiryTransactionResponse,
  MultiplexingInformation,
  VerifyTransactionRequest,
  VerifyTransactionResponse,
} from '../dto';
import { FeeMode } from '../enums';
import { ZibalClient } from '../zibal.client';

type FakeResponse = { status: number; data: string };

describe('ZibalClient', () => {
  let client: ZibalClient;
  const post = jest.fn<Promise<FakeResponse>, [string, unknown, AxiosRequestConfig]>();

  const respondWith = (body: unknown, status = 200) =>
    post.mockResolvedValueOnce({
      status,
      data: typeof body === 'string' ? body : JSON.stringify(body),
    });

  const createRequest = new CreateTransactionRequest({
    merchant: 'abc',
    amount: 10000,
    callbackUrl: 'https://shop.test/callback',
    isTest: true,
  });
  const verifyRequest = new VerifyTransactionRequest({ merchant: 'merchant-1', trackId: 123 });
  const inquiryRequest = new InquiryTransactionRequest({ merchant: 'merchant-1', trackId: 123 });

  const beneficiaries = [
    { subMerchantId: 'sub-1', amount: 7000, wagePayer: true },
    { bankAccount: 'IR000000000000000000000001', amount: 3000, wagePayer: false },
  ];

  beforeEach(async () => {
    post.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        ZibalClient,
        AppConfigService,
        LoggerService,
        { provide: HttpService, useValue: { axiosRef: { post } } },
      ],
    }).compile();

    client = moduleRef.get(ZibalClient);
  });

  describe('requestTransaction', () => {
    it('should POST the serialized request as JSON to the create endpoint', async () => {
      respondWith({ trackId: 15966442233311, result: 100, message: 'success' });

      const response = await client.requestTransaction(createRequest);

      expect(post).toHaveBeenCalledTimes(1);
      const [url, body, config] = post.mock.calls[0];
      expect(url).toBe('https://gateway.zibal.ir/v1/request');
      expect(body).toEqual({
        merchant: 'zibal',
        amount: 10000,
        callbackUrl: 'https://shop.test/callback',
        checkMobileWithCard: false,
      });
      expect(config.headers).toEqual({ 'Content-Type': 'application/json; charset=utf-8' });
      expect(config.responseType).toBe('text');

      expect(response).toBeInstanceOf(CreateTransactionResponse);
      expect(response.trackId).toBe(15966442233311);
      expect(response.result).toBe(100);
      expect(response.message).toBe('success');
      expect(response.succeeded).toBe(true);
    });

    it('should use the lazy endpoint when asked to', async () => {
      respondWith({ trackId: 1, result: 100, message: 'success' });

      await client.requestTransaction(createRequest, true);

      expect(post.mock.calls[0][0]).toBe('https://gateway.zibal.ir/request/lazy');
    });

    it('should ignore beneficiaries in standard mode', async () => {
      respondWith({ trackId: 1, result: 100, message: 'success', multiplexingInfos: beneficiaries });

      const response = await client.requestTransaction(createRequest);

      expect(response).not.toBeInstanceOf(CreateAdvancedTransactionResponse);
      expect(response).not.toHaveProperty('multiplexingInfos');
    });

    it('should read beneficiaries in order in advanced mode', async () => {
      respondWith({ trackId: 1, result: 100, message: 'success', multiplexingInfos: beneficiaries });
      const request = new CreateAdvancedTransactionRequest({
        merchant: 'merchant-1',
        amount: 10000,
        callbackUrl: 'https://shop.test/callback',
        feeMode: FeeMode.FromTransaction,
        multiplexingInfos: beneficiaries,
      });

      const response = await client.requestTransaction(request, false, true);

      expect(response).toBeInstanceOf(CreateAdvancedTransactionResponse);
      expect(response.multiplexingInfos).toHaveLength(2);
      expect(response.multiplexingInfos[0]).toBeInstanceOf(MultiplexingInformation);
      expect(response.multiplexingInfos.map((info) => info.toPayload())).toEqual(beneficiaries);
      expect(post.mock.calls[0][1]).toEqual(request.toPayload());
    });

    it('should read a non-2xx reply like any other', async () => {
      respondWith({ result: 102, message: 'merchant not found' }, 401);

      const response = await client.requestTransaction(createRequest);

      expect(response.result).toBe(102);
      expect(response.succeeded).toBe(false);
      expect(response.trackId).toBeUndefined();
      expect(post.mock.calls[0][2].validateStatus?.(500)).toBe(true);
    });

    it('should fail on a body that is not JSON', async () => {
      respondWith('<html>502 Bad Gateway</html>', 502);

      await expect(client.requestTransaction(createRequest)).rejects.toBeInstanceOf(
        DeserializationException,
      );
    });
  });

  describe('verifyTransaction', () => {
    it('should POST to the verify endpoint and read the payment', async () => {
      respondWith({
        paidAt: '2024-03-01T10:15:30.000Z',
        cardNumber: '62741****44',
        status: 1,
        amount: 10000,
        refNumber: 98765,
        description: 'Order #7',
        orderId: ' order-7 ',
        result: 100,
        message: 'success',
      });

      const response = await client.verifyTransaction(verifyRequest);

      const [url, body] = post.mock.calls[0];
      expect(url).toBe('https://gateway.zibal.ir/v1/verify');
      expect(body).toEqual({ merchant: 'merchant-1', trackId: 123 });

      expect(response).toBeInstanceOf(VerifyTransactionResponse);
      expect(response.paidAt).toEqual(new Date('2024-03-01T10:15:30.000Z'));
      expect(response.cardNumber).toBe('62741****44');
      expect(response.status).toBe(1);
      expect(response.amount).toBe(10000);
      expect(response.refNumber).toBe(98765);
      expect(response.description).toBe('Order #7');
      expect(response.orderId).toBe('order-7');
    });

    it('should fail on an empty body', async () => {
      respondWith('');

      await expect(client.verifyTransaction(verifyRequest)).rejects.toThrow(
        '10502 - Empty body, expected VerifyTransactionResponse',
      );
    });
  });

  describe('getTransactionStatus', () => {
    it('should POST to the inquiry endpoint and read timestamps and wage', async () => {
      respondWith({
        createdAt: '2024-03-01T10:10:00.000Z',
        paidAt: '2024-03-01T10:15:30.000Z',
        verifiedAt: '2024-03-01T10:16:00.000Z',
        cardNumber: '62741****44',
        status: 1,
        amount: 10000,
        refNumber: null,
        description: null,
        orderId: 'order-7',
        wage: 2,
        result: 100,
        message: 'success',
      });

      const response = await client.getTransactionStatus(inquiryRequest);

      expect(post.mock.calls[0][0]).toBe('https://gateway.zibal.ir/v1/inquiry');
      expect(response).toBeInstanceOf(InquiryTransactionResponse);
      expect(response.createdAt).toEqual(new Date('2024-03-01T10:10:00.000Z'));
      expect(response.verifiedAt).toEqual(new Date('2024-03-01T10:16:00.000Z'));
      expect(response.wage).toBe(FeeMode.PaidByPayer);
      expect(response.refNumber).toBeNull();
    });

    it('should default beneficiaries to empty on an advanced business failure', async () => {
      respondWith({ result: 203, message: 'trackId is invalid' });

      const response = await client.getTransactionStatus(inquiryRequest, true);

      expect(response).toBeInstanceOf(InquiryAdvancedTransactionResponse);
      expect(response.result).toBe(203);
      expect(response.multiplexingInfos).toEqual([]);
    });

    it('should let transport errors through untouched', async () => {
      const error = new Error('socket hang up');
      post.mockRejectedValueOnce(error);

      await expect(client.getTransactionStatus(inquiryRequest)).rejects.toBe(error);
    });
  });

  it('should keep no state between calls', async () => {
    respondWith({ trackId: 1, result: 100, message: 'success' });
    respondWith({ trackId: 2, result: 100, message: 'success' });

    const [first, second] = await Promise.all([
      client.requestTransaction(createRequest),
      client.requestTransaction(createRequest),
    ]);

    expect(first.trackId).toBe(1);
    expect(second.trackId).toBe(2);
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('should build the payment page URL for a trackId', () => {
    expect(client.buildPaymentUrl(15966442233311)).toBe(
      'https://gateway.zibal.ir/start/15966442233311',
    );
  });
});
