/**
 * Webhook URLs Configuration
 * Builds the absolute URLs Twilio calls back on.
 *
 * The base URL comes from the launcher argument or PUBLIC_URL. Without one the
 * bare paths are returned, which only work for local testing.
 */

export class WebhookConfig {
  private readonly baseUrl: string;

  constructor(baseUrl = '') {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Get the base API URL
   */
  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Absolute URL for a path, or the path itself when no public URL is known
   */
  getFullUrl(path: string): string {
    const normalized = path.startsWith('/') ? path : `/${path}`;
    return this.baseUrl ? `${this.baseUrl}${normalized}` : normalized;
  }
}
