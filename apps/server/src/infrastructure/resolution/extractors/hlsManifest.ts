/**
 * Master playlist reading: enough to pick a rendition by height
 */

import type { ManifestVariant } from '../../../domain/resolution';

const STREAM_INF = '#EXT-X-STREAM-INF:';

function resolveUri(uri: string, baseUrl: string): string {
  try {
    return new URL(uri, baseUrl).toString();
  } catch {
    return uri;
  }
}

export function parseMasterPlaylist(text: string, baseUrl: string): ManifestVariant[] {
  const variants: ManifestVariant[] = [];
  const lines = text.split(/\r?\n/).map(line => line.trim());

  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].startsWith(STREAM_INF)) continue;

    const attributes = lines[i].slice(STREAM_INF.length);
    const resolution = attributes.match(/RESOLUTION=(\d+)x(\d+)/);
    const bandwidth = attributes.match(/(?:^|,)BANDWIDTH=(\d+)/);

    let uriIndex = i + 1;
    while (uriIndex < lines.length && (lines[uriIndex] === '' || lines[uriIndex].startsWith('#'))) {
      uriIndex++;
    }
    if (uriIndex >= lines.length) break;

    variants.push({
      url: resolveUri(lines[uriIndex], baseUrl),
      width: resolution ? parseInt(resolution[1], 10) : undefined,
      height: resolution ? parseInt(resolution[2], 10) : undefined,
      bandwidth: bandwidth ? parseInt(bandwidth[1], 10) : undefined
    });
    i = uriIndex;
  }

  return variants;
}

/**
 * Variant whose height is closest to the target; the first listed wins a tie
 */
export function pickClosestVariant(variants: readonly ManifestVariant[], targetHeight: number): ManifestVariant | null {
  let best: ManifestVariant | null = null;
  let bestDistance = Infinity;

  for (const variant of variants) {
    if (variant.height === undefined) continue;
    const distance = Math.abs(variant.height - targetHeight);
    if (distance < bestDistance) {
      best = variant;
      bestDistance = distance;
    }
  }

  return best;
}
