import { Injectable } from '@nestjs/common';
import { CACHE_TTL } from '../../utils/constants';

/**
 * Cache keys and lifetimes, in one place so writers and invalidators agree.
 */
@Injectable()
export class CacheMapper {
  checkoutSessionView(sessionId: string) {
    return {
      key: `checkout_session_${sessionId}`,
      ttl: CACHE_TTL.MINUTE,
    };
  }
}
