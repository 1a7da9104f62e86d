import * as crypto from 'crypto';
import { hmacSha256, safeEqual } from '../../src/_shared/utils';

describe('signature utils', () => {
  it('should compare equal strings only', () => {
    expect(safeEqual('test-secret', 'test-secret')).toBe(true);
    expect(safeEqual('test-secret', 'test-secreT')).toBe(false);
    expect(safeEqual('test-secret', 'test')).toBe(false);
  });

  it('should produce a hex HMAC-SHA256 digest', () => {
    const expected = crypto.createHmac('sha256', 'test-secret').update('payload').digest('hex');

    expect(hmacSha256('test-secret', 'payload')).toBe(expected);
    expect(hmacSha256('test-secret', Buffer.from('payload'))).toBe(expected);
  });
});
