import { Catalogue, CatalogueStats } from "../domain/catalogue";
import { CatalogueUnavailableError } from "../domain/errors";
import { loadCatalogueFile } from "../loaders/catalogueLoader";

export type CatalogueSource = () => Catalogue;

/**
 * CatalogueStore holds the live catalogue snapshot.
 * A reload builds a complete new Catalogue and swaps the reference; requests that
 * already hold the previous snapshot keep using it.
 */
export class CatalogueStore {
  private catalogue: Catalogue | null = null;
  private lastError: unknown = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly source: CatalogueSource;

  constructor(source: CatalogueSource) {
    this.source = source;
  }

  static fromFile(filePath: string): CatalogueStore {
    return new CatalogueStore(() => loadCatalogueFile(filePath));
  }

  /**
   * Load a fresh snapshot. On failure the previous snapshot stays live and the error is rethrown.
   */
  reload(): Catalogue {
    try {
      const next = this.source();
      this.catalogue = next;
      this.lastError = null;
      return next;
    } catch (error) {
      this.lastError = error;
      throw error;
    }
  }

  /**
   * The live snapshot, or CatalogueUnavailableError if nothing has loaded yet
   */
  current(): Catalogue {
    if (!this.catalogue) {
      throw new CatalogueUnavailableError(this.lastError ?? undefined);
    }
    return this.catalogue;
  }

  isLoaded(): boolean {
    return this.catalogue !== null;
  }

  getLastError(): unknown {
    return this.lastError;
  }

  stats(): CatalogueStats | null {
    return this.catalogue ? this.catalogue.stats() : null;
  }

  /**
   * Re-read the source every `minutes`. Failed reloads are logged and the old snapshot kept.
   */
  startAutoReload(minutes: number): void {
    this.stopAutoReload();
    if (minutes <= 0) return;

    this.timer = setInterval(() => {
      try {
        const stats = this.reload().stats();
        console.log(`Catalogue reloaded: ${stats.courses} courses, ${stats.sections} sections`);
      } catch (error) {
        console.error("Error reloading catalogue:", error);
      }
    }, minutes * 60 * 1000);
    this.timer.unref();
  }

  stopAutoReload(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
