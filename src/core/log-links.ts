export interface LogLink {
  appName: string;
  url: string;
}

/**
 * Application name to log-viewer URL, as configured through APP_LOGS_MAP.
 * Keeps the configured order.
 */
export class LogLinkDirectory {
  private readonly links: ReadonlyMap<string, string>;

  constructor(links: Record<string, string> = {}) {
    this.links = new Map(Object.entries(links));
  }

  get size(): number {
    return this.links.size;
  }

  isEmpty(): boolean {
    return this.links.size === 0;
  }

  /**
   * Links whose application name contains `filter`, ignoring case. Without a
   * filter, every link.
   */
  find(filter?: string): LogLink[] {
    const needle = filter?.toLowerCase();
    const matches: LogLink[] = [];
    for (const [appName, url] of this.links) {
      if (!needle || appName.toLowerCase().includes(needle)) {
        matches.push({ appName, url });
      }
    }
    return matches;
  }

  get(appName: string): LogLink | undefined {
    const url = this.links.get(appName);
    return url === undefined ? undefined : { appName, url };
  }
}
