/**
 * Opens the source-archive URL; the browser saves the ZIP into the download directory.
 */
export interface BrowserService {
  open(url: string): Promise<void>;
}
