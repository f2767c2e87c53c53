import { headerValue } from './headers';

describe('headerValue', () => {
  it('returns the trimmed first value', () => {
    expect(headerValue({ 'x-customer-id': ' customer-1 ' }, 'X-Customer-Id')).toBe('customer-1');
    expect(headerValue({ 'set-cookie': ['a=1', 'b=2'] }, 'set-cookie')).toBe('a=1');
  });

  it('treats blank and missing headers as absent', () => {
    expect(headerValue({ 'x-customer-id': '   ' }, 'x-customer-id')).toBeUndefined();
    expect(headerValue({}, 'x-customer-id')).toBeUndefined();
  });
});
