import { CallbackQuery, LazyCallbackResponse } from '../dto/callback.dto';
import { ZibalCallbackQuery } from '../zibal.interface';
import { ZibalPayloadMapper } from './payload.mapper';

/**
 * Reads what the gateway sends to the merchant's callback URL. Receiving the
 * request is up to the caller's own HTTP server.
 */
export class ZibalCallbackMapper {
  /** Lazy mode: a JSON body, raw or already parsed by the server. */
  static fromLazyBody(body: string | object): LazyCallbackResponse {
    return typeof body === 'string'
      ? ZibalPayloadMapper.fromBody(LazyCallbackResponse, body)
      : ZibalPayloadMapper.fromPlain(LazyCallbackResponse, body);
  }

  /** Standard mode: query parameters. Repeated keys keep their first value. */
  static fromQuery(query: ZibalCallbackQuery): CallbackQuery {
    const plain: Record<string, string | undefined> = {};

    if (query instanceof URLSearchParams) {
      query.forEach((value, key) => {
        plain[key] ??= value;
      });
    } else {
      for (const [key, value] of Object.entries(query)) {
        plain[key] = typeof value === 'string' ? value : value?.[0];
      }
    }

    return ZibalPayloadMapper.fromPlain(CallbackQuery, plain);
  }
}
