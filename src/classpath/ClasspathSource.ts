import { promises as fs } from 'fs';
import path from 'path';
import { ResolutionError, describeError } from '../utils/errors';

/**
 * Supplies the raw test classpath elements of a build.
 * Implementations throw ResolutionError when the elements are not available yet.
 */
export interface ClasspathSource {
  describe(): string;
  getTestClasspathElements(): Promise<string[]>;
}

export class StaticClasspathSource implements ClasspathSource {
  constructor(private readonly elements: readonly string[]) {}

  describe(): string {
    return `${this.elements.length} configured element(s)`;
  }

  async getTestClasspathElements(): Promise<string[]> {
    return [...this.elements];
  }
}

/**
 * Reads a classpath file, as written by `mvn dependency:build-classpath -Dmdep.outputFile=...`
 */
export class ClasspathFileSource implements ClasspathSource {
  constructor(private readonly file: string) {}

  describe(): string {
    return `classpath file ${this.file}`;
  }

  async getTestClasspathElements(): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.file, 'utf8');
    } catch (error) {
      throw new ResolutionError(
        `Resolving test class-path elements failed: cannot read ${this.file} (dependency resolution has not been performed)`,
        { file: this.file, cause: describeError(error) }
      );
    }
    return content
      .split(/\r?\n/)
      .flatMap(line => line.split(path.delimiter))
      .map(element => element.trim())
      .filter(element => element.length > 0);
  }
}

export class CompositeClasspathSource implements ClasspathSource {
  constructor(private readonly sources: readonly ClasspathSource[]) {}

  describe(): string {
    return this.sources.map(source => source.describe()).join(' + ');
  }

  async getTestClasspathElements(): Promise<string[]> {
    const elements: string[] = [];
    for (const source of this.sources) {
      elements.push(...(await source.getTestClasspathElements()));
    }
    return elements;
  }
}
