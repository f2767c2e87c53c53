export const CACHE_TTL = {
  MINUTE: 60,
  HOUR: 3600, // 60 * MINUTE
  DAY: 86400, // 24 * HOUR
  HRS_12: 43200, // 12 * HOUR
};

export const CUSTOMER_ID_HEADER = 'x-customer-id';
export const CORRELATION_ID_HEADER = 'x-correlation-id';
