import path from 'path';
import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from '../core/container/identifiers';
import { JsonFileParser, SectionParser, isSectionParser, toSection } from './parsers';
import type { Section, SectionObject } from '../types/section';
import { CantParseError } from '../utils/errors';
import type { Logger } from '../utils/logger';

/** A file path, an already built section, a plain nested object or a parser. */
export type FixtureSource = string | Section | SectionObject | SectionParser;

export type ParserFactory = (filePath: string) => SectionParser;

/**
 * Normalises fixture sources into sections. File paths are dispatched on
 * their extension; only `.json` is known unless more parsers are registered.
 */
@injectable()
export class SourceLoader {
  private parsers = new Map<string, ParserFactory>([['.json', filePath => new JsonFileParser(filePath)]]);
  private readonly logger: Logger;

  constructor(@inject(SERVICE_IDENTIFIERS.LOGGER) logger: Logger) {
    this.logger = logger.child('sources');
  }

  /** Register a parser for a file extension. Extensions match case-insensitively. */
  registerParser(extension: string, factory: ParserFactory): this {
    const key = extension.startsWith('.') ? extension.toLowerCase() : `.${extension.toLowerCase()}`;
    this.parsers.set(key, factory);
    this.logger.debug('Parser registered', { extension: key });
    return this;
  }

  /** Turn one source into a section: a file path, a plain object, a parser or a ready section. */
  load(source: FixtureSource): Section {
    if (typeof source === 'string') {
      return this.loadFile(source);
    }
    if (isSectionParser(source)) {
      this.logger.debug('Parsing source', { source: source.describe ? source.describe() : 'parser' });
      return source.parse();
    }
    return toSection(source, 'inline source');
  }

  /** Load every source in order. The first failure stops the rest. */
  loadAll(sources: readonly FixtureSource[]): Section[] {
    return sources.map(source => this.load(source));
  }

  private loadFile(filePath: string): Section {
    const extension = path.extname(filePath).toLowerCase();
    const factory = this.parsers.get(extension);
    if (!factory) {
      throw new CantParseError(
        filePath,
        '',
        `no parser for '${extension || '(no extension)'}' files; known: ${Array.from(this.parsers.keys()).join(', ')}`
      );
    }

    this.logger.debug('Reading fixture file', { file: filePath });
    return factory(filePath).parse();
  }
}
