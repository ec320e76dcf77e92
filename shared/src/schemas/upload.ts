export const DEFAULT_ALLOWED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp'] as const;

export interface UploadResponse {
  url: string;
  /** null when no thumbnail was produced */
  thumbnail_url: string | null;
}
