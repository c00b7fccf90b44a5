/** A downloadable file attached to a queue item. */
export interface AttachmentRef {
  id: string;
  name: string;
  url: string;
  mimeType?: string;
  bytes?: number;
  /** Request headers the download needs (board authentication) */
  headers: Record<string, string>;
}
