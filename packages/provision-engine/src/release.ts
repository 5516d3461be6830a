/**
 * Release codename lookup
 *
 * Reads the `Codename:` field of a Debian archive Release file. Lookup is
 * best-effort: every failure resolves to undefined and the caller picks a
 * fallback.
 */

export const DEFAULT_RELEASE_URL = 'http://ftp.debian.org/debian/dists/stable/Release';

const CODENAME_PATTERN = /^[a-z][a-z0-9-]*$/;

export interface ReleaseResolver {
  resolve(): Promise<string | undefined>;
}

export interface DebianReleaseResolverOptions {
  url?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Extract the codename from Release file contents
 */
export function parseReleaseCodename(contents: string): string | undefined {
  for (const line of contents.split(/\r?\n/)) {
    const match = line.match(/^Codename:\s*(.*)$/);
    if (!match) continue;

    const codename = match[1].trim().replace(/^["']+|["']+$/g, '').trim();
    return CODENAME_PATTERN.test(codename) ? codename : undefined;
  }
  return undefined;
}

export class DebianReleaseResolver implements ReleaseResolver {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DebianReleaseResolverOptions = {}) {
    this.url = options.url ?? DEFAULT_RELEASE_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async resolve(): Promise<string | undefined> {
    try {
      const response = await this.fetchImpl(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) return undefined;
      return parseReleaseCodename(await response.text());
    } catch {
      return undefined;
    }
  }
}

/**
 * Resolver that always answers with the same release
 */
export class FixedReleaseResolver implements ReleaseResolver {
  constructor(private readonly release: string | undefined) {}

  async resolve(): Promise<string | undefined> {
    return this.release;
  }
}
