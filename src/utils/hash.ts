import { createHash } from 'node:crypto';

export interface ContentDigest {
  md5: string;
  sha256: string;
  size: number;
}

export function digest(data: Uint8Array, algorithm: string = 'sha256'): string {
  return createHash(algorithm).update(data).digest('hex');
}

export function contentDigest(data: Uint8Array): ContentDigest {
  return {
    md5: digest(data, 'md5'),
    sha256: digest(data, 'sha256'),
    size: data.byteLength,
  };
}
