import type { BrowserService } from "../ports/browser.js";

/**
 * Browser service using the 'open' package.
 * Opens the given app when one is configured, otherwise the system default.
 */
export function createSystemBrowser(appName?: string): BrowserService {
  return {
    async open(url: string): Promise<void> {
      const openModule = await import("open");
      await openModule.default(url, {
        wait: false,
        ...(appName && { app: { name: appName } }),
      });
    },
  };
}
