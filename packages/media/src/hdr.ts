/**
 * HDR classification
 */

import type { StreamDescriptor } from './types.js';

/** PQ and HLG transfer characteristics as ffprobe names them */
export const HDR_TRANSFERS: readonly string[] = ['smpte2084', 'arib-std-b67'];

/**
 * Whether the first video stream carries HDR. The transfer function and
 * BT.2020 primaries are independent signals; either one is enough.
 * Later video streams (cover art, alternate angles) are not consulted.
 */
export function isHdr(streams: readonly StreamDescriptor[]): boolean {
  const video = streams.find(s => s.codecType === 'video');
  if (!video) return false;

  const transfer = video.colorTransfer?.toLowerCase() ?? '';
  const primaries = video.colorPrimaries?.toLowerCase() ?? '';

  return HDR_TRANSFERS.includes(transfer) || primaries === 'bt2020';
}
