import path from 'path';

export const JUNIT_PLATFORM_VERSION = 'junit.platform.version';
export const JUNIT_JUPITER_VERSION = 'junit.jupiter.version';

const ARTIFACT_KEYS: ReadonlyArray<{ pattern: RegExp; key: string }> = [
  { pattern: /^junit-platform-[a-z-]+?-(\d[\w.-]*)\.jar$/, key: JUNIT_PLATFORM_VERSION },
  { pattern: /^junit-jupiter(?:-[a-z]+)?-(\d[\w.-]*)\.jar$/, key: JUNIT_JUPITER_VERSION }
];

/**
 * Versions detected from the jar names on the classpath, with user overrides on top
 */
export class VersionLookup {
  private detected = new Map<string, string>();

  constructor(private readonly overrides: Readonly<Record<string, string>> = {}) {}

  static fromClasspath(entries: readonly string[], overrides: Readonly<Record<string, string>> = {}): VersionLookup {
    const lookup = new VersionLookup(overrides);
    for (const entry of entries) {
      lookup.scan(path.basename(entry));
    }
    return lookup;
  }

  private scan(fileName: string): void {
    for (const { pattern, key } of ARTIFACT_KEYS) {
      const match = pattern.exec(fileName);
      if (match?.[1] && !this.detected.has(key)) {
        this.detected.set(key, match[1]);
      }
    }
  }

  version(key: string): string | undefined {
    return this.overrides[key] ?? this.detected.get(key);
  }

  entries(): Array<[string, string]> {
    const keys = new Set([...this.detected.keys(), ...Object.keys(this.overrides)]);
    const pairs: Array<[string, string]> = [];
    for (const key of [...keys].sort()) {
      const value = this.version(key);
      if (value !== undefined) {
        pairs.push([key, value]);
      }
    }
    return pairs;
  }
}
