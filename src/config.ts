/**
 * Runtime configuration, read from the Vite environment (`VITE_*` variables).
 */

export interface EditorConfig {
  documentUrl: string;     // element document fetched on startup
  imageBaseUrl: string;    // table / extra image paths are resolved against this
}

export const DEFAULT_CONFIG: EditorConfig = {
  documentUrl: '/elements.json',
  imageBaseUrl: '/elements/',
};

export function loadEditorConfig(env: Record<string, string | boolean | undefined>): EditorConfig {
  const pick = (key: string, fallback: string) => {
    const v = env[key];
    return typeof v === 'string' && v.trim() !== '' ? v.trim() : fallback;
  };
  const imageBaseUrl = pick('VITE_IMAGE_BASE_URL', DEFAULT_CONFIG.imageBaseUrl);
  return {
    documentUrl: pick('VITE_DOCUMENT_URL', DEFAULT_CONFIG.documentUrl),
    imageBaseUrl: imageBaseUrl.endsWith('/') ? imageBaseUrl : `${imageBaseUrl}/`,
  };
}

export function resolveImageUrl(config: EditorConfig, path: string): string {
  return `${config.imageBaseUrl}${path.replace(/^\/+/, '')}`;
}
