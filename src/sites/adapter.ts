import type { AssetType, ContentItem } from '../content/item.js';

export interface AuthStatus {
  authenticated: boolean;
  message: string;
}

/**
 * A progress report from an adapter while it indexes or downloads.
 * `bytes`/`totalBytes` are set for byte transfers.
 */
export interface ProgressUpdate {
  message?: string;
  bytes?: number;
  totalBytes?: number;
}

export type ProgressSink = (update: ProgressUpdate) => void;

export type DownloadResult =
  | { ok: true; message: string; files: string[] }
  | { ok: false; message: string; restricted: boolean };

/**
 * Settings a site asks the user for (shown by `stowaway sites`).
 */
export interface ConfigField {
  id: string;
  label: string;
  type: 'text' | 'password' | 'url';
  required: boolean;
}

/**
 * Static description of a site, available without constructing its adapter.
 */
export interface SiteDescriptor {
  id: string;
  name: string;
  requiresAuth: boolean;
  assetTypes: AssetType[];
  categories: string[];
  /** Heavy sources run last in a multi-source sync. */
  heavy: boolean;
}

/**
 * Site adapter interface. Implement for each site.
 *
 * `indexContent` must give logically identical content the same id on every
 * call. `downloadItem` owns the file layout inside `outputDir` and any
 * fallback chain; it reports failure through its result. When `signal`
 * aborts it must stop its transfers and settle promptly.
 */
export interface SiteAdapter {
  readonly descriptor: SiteDescriptor;
  configFields(): ConfigField[];
  checkAuth(): Promise<AuthStatus>;
  login(credentials: Record<string, string>): Promise<AuthStatus>;
  indexContent(sink?: ProgressSink): Promise<ContentItem[]>;
  downloadItem(item: ContentItem, outputDir: string, sink?: ProgressSink, signal?: AbortSignal): Promise<DownloadResult>;
  close(): Promise<void>;
}

const RESTRICTED_PATTERN = /access denied|\b403\b|forbidden/i;

/**
 * Whether a failure message reports an access restriction rather than a
 * transient error.
 */
export function isRestrictedMessage(message: string): boolean {
  return RESTRICTED_PATTERN.test(message);
}
