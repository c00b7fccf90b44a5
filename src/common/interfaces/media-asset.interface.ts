import type { MediaKind } from '../constants/media.constant';

/**
 * A downloaded and validated media file, ready for transcoding.
 * Never mutated after creation.
 */
export interface MediaAsset {
  readonly path: string; // absolute
  readonly kind: MediaKind;
  readonly format: string; // detected MIME type
  readonly sizeBytes: number;
}
