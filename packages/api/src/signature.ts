import { createHash } from 'node:crypto';

/**
 * Signature of a track/getFileUrl request: lowercase hex md5 of
 * "trackgetFileUrlformat_id{fmt}intentstreamtrack_id{trackId}{ts}{secret}"
 */
export function signFileUrlRequest(
  formatId: number,
  trackId: string | number,
  timestamp: number,
  secret: string
): string {
  const payload = `trackgetFileUrlformat_id${formatId}intentstreamtrack_id${trackId}${timestamp}${secret}`;
  return createHash('md5').update(payload).digest('hex');
}

export function unixTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}
