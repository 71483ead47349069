import { fileURLToPath } from 'node:url';
import { dirname, isAbsolute, join } from 'node:path';
import { readFileSync } from 'node:fs';

/**
 * Centralized path resolution for the relay.
 * Everything that needs the package root, the data directory or the
 * package version goes through this singleton.
 */
class PathResolver {
  private static instance: PathResolver;

  /** Root directory of the npm package (where package.json lives) */
  public readonly projectRoot: string;

  private version: string | undefined;

  private constructor() {
    // src/utils/paths.ts and dist/utils/paths.js both sit two levels below the root
    const currentDir = dirname(fileURLToPath(import.meta.url));
    this.projectRoot = dirname(dirname(currentDir));
  }

  public static getInstance(): PathResolver {
    if (!PathResolver.instance) {
      PathResolver.instance = new PathResolver();
    }
    return PathResolver.instance;
  }

  /**
   * Application version from package.json, read once on first use.
   */
  public getVersion(): string {
    if (this.version === undefined) {
      const raw: unknown = JSON.parse(readFileSync(join(this.projectRoot, 'package.json'), 'utf-8'));
      const version = typeof raw === 'object' && raw !== null && 'version' in raw ? raw.version : undefined;
      this.version = typeof version === 'string' ? version : '0.0.0';
    }
    return this.version;
  }

  /**
   * Resolve a configured data directory. Relative values resolve against the package root.
   * @example
   * paths.resolveDataDir('data')           // '/path/to/package/data'
   * paths.resolveDataDir('/var/lib/relay') // '/var/lib/relay'
   */
  public resolveDataDir(dir: string): string {
    return isAbsolute(dir) ? dir : join(this.projectRoot, dir);
  }

  /** Default data directory, used until configuration says otherwise */
  public get dataDir(): string {
    return this.resolveDataDir('data');
  }
}

export const paths = PathResolver.getInstance();
