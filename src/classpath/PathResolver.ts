import { promises as fs } from 'fs';
import path from 'path';
import type { ClasspathSource } from './ClasspathSource';
import { Logger } from '../utils/logger';

export class PathResolver {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child('path-resolver');
  }

  /**
   * Fetch the raw elements from the source and resolve them.
   * A ResolutionError from the source propagates untouched.
   */
  async resolveFrom(source: ClasspathSource): Promise<string> {
    this.logger.debug('Fetching test class-path elements', { source: source.describe() });
    const elements = await source.getTestClasspathElements();
    return this.resolve(elements);
  }

  /**
   * Turn raw classpath elements into a single path-delimited string of
   * absolute, existing, de-duplicated entries in their original order.
   */
  async resolve(rawElements: readonly string[]): Promise<string> {
    const entries: string[] = [];
    const seen = new Set<string>();

    for (const element of rawElements) {
      const absolute = path.resolve(element);
      const resolved = await this.realPathOrNull(absolute);
      if (resolved === null) {
        this.logger.debug(`   X ${absolute} // doesn't exist`);
        continue;
      }
      if (seen.has(resolved)) {
        this.logger.debug(`   = ${resolved} // duplicate`);
        continue;
      }
      this.logger.debug(`  -> ${resolved}`);
      seen.add(resolved);
      entries.push(resolved);
    }

    return entries.join(path.delimiter);
  }

  private async realPathOrNull(absolute: string): Promise<string | null> {
    try {
      return await fs.realpath(absolute);
    } catch {
      // Not every declared element materializes, e.g. an empty output directory
      return null;
    }
  }
}
