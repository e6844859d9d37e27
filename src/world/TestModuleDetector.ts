import { promises as fs } from 'fs';
import path from 'path';
import type { LaunchContext } from '../types/launch';
import type { Logger } from '../utils/logger';

export const MODULE_INFO_FILE = 'module-info.java';

const MODULE_DECLARATION = /^\s*(?:@[\w.]+(?:\([^)]*\))?\s*)*(?:open\s+)?module\s+([A-Za-z_$][\w$]*(?:\s*\.\s*[A-Za-z_$][\w$]*)*)\s*\{/m;

/**
 * Extract the module name from the source of a module declaration
 */
export function parseModuleName(source: string): string | undefined {
  const withoutComments = source
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/\/\/.*$/gm, '');
  const match = MODULE_DECLARATION.exec(withoutComments);
  return match?.[1]?.replace(/\s+/g, '');
}

export class TestModuleDetector {
  private logger: Logger;

  constructor(context: LaunchContext) {
    this.logger = context.logger.child('test-module-detector');
  }

  /**
   * Read `module-info.java` from the test source directory, if there is one
   */
  async detect(testSourceDirectory: string): Promise<string | undefined> {
    const descriptor = path.join(testSourceDirectory, MODULE_INFO_FILE);
    let source: string;
    try {
      source = await fs.readFile(descriptor, 'utf8');
    } catch {
      this.logger.debug('No test module descriptor found', { descriptor });
      return undefined;
    }

    const name = parseModuleName(source);
    if (name) {
      this.logger.decision('Test module detected', name, `declared in ${descriptor}`);
    } else {
      this.logger.warn('Test module descriptor has no module declaration', { descriptor });
    }
    return name;
  }
}
