/**
 * AzAdvertizer Definition Source
 *
 * Resolves policy and policy set definitions from AzAdvertizer pages:
 * - policies:    {base}/azpolicyadvertizer/{id}.html
 * - initiatives: {base}/azpolicyinitiativesadvertizer/{id}.html
 *
 * Each page embeds the full definition JSON in a script block of the form
 * `function copyDef() { const obj = {...};`. The object literal is cut out
 * with a brace scanner that respects JSON strings, then parsed.
 *
 * A 404 or a page without an embedded definition is "not found". Network
 * failures, timeouts and exhausted retries become FetchFailure.
 */

import { AZADVERTIZER_BASE } from '../core/constants.js';
import { FetchFailure } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import type { Definition, TargetKind } from '../core/types.js';
import { createLogger, type ComponentLogger } from '../core/utils/logger.js';
import { parseDefinitionDocument } from './definition-parser.js';
import type { RequestPacer } from './request-pacer.js';
import type { DefinitionSource } from './types.js';

const COPY_DEF_PREFIX = /function\s+copyDef\s*\(\s*\)\s*\{\s*const\s+obj\s*=\s*/;

export interface AzAdvertizerDefinitionSourceOptions {
  readonly client: HTTPClient;
  readonly pacer: RequestPacer;
  readonly baseUrl?: string;
  readonly logger?: ComponentLogger;
}

/**
 * Slice of `text` holding the balanced `{...}` starting at `start`
 *
 * @returns null when `text[start]` is not `{` or the braces never balance
 */
export function sliceBalancedObject(text: string, start: number): string | null {
  if (text[start] !== '{') {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Definition document embedded in an AzAdvertizer page, or null
 */
export function extractEmbeddedDefinition(html: string): unknown {
  const match = COPY_DEF_PREFIX.exec(html);
  if (!match) {
    return null;
  }

  const literal = sliceBalancedObject(html, match.index + match[0].length);
  if (literal === null) {
    return null;
  }

  try {
    const document: unknown = JSON.parse(literal);
    return document;
  } catch {
    return null;
  }
}

export class AzAdvertizerDefinitionSource implements DefinitionSource {
  readonly name = 'azadvertizer';

  private readonly client: HTTPClient;
  private readonly pacer: RequestPacer;
  private readonly baseUrl: string;
  private readonly log: ComponentLogger;

  constructor(options: AzAdvertizerDefinitionSourceOptions) {
    this.client = options.client;
    this.pacer = options.pacer;
    this.baseUrl = (options.baseUrl ?? AZADVERTIZER_BASE).replace(/\/+$/, '');
    this.log = options.logger ?? createLogger({ module: 'azadvertizer-source' });
  }

  /**
   * Page URL for a definition
   */
  pageUrl(definitionId: string, kind: TargetKind): string {
    const section = kind === 'Initiative' ? 'azpolicyinitiativesadvertizer' : 'azpolicyadvertizer';
    return `${this.baseUrl}/${section}/${encodeURIComponent(definitionId)}.html`;
  }

  async fetchDefinition(definitionId: string, kind: TargetKind): Promise<Definition | null> {
    const url = this.pageUrl(definitionId, kind);

    let html: string | null;
    try {
      await this.pacer.wait();
      html = await this.client.fetchTextOrNull(url, { headers: { Accept: 'text/html' } });
    } catch (error) {
      throw new FetchFailure(
        definitionId,
        kind,
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    }

    if (html === null) {
      return null;
    }

    const document = extractEmbeddedDefinition(html);
    if (document === null) {
      this.log.warn('Page carries no embedded definition', { definitionId, kind, url });
      return null;
    }

    const parsed = parseDefinitionDocument(document, definitionId);
    if (!parsed.success) {
      this.log.warn('Embedded definition is malformed', { definitionId, kind, url, error: parsed.error });
      return null;
    }
    return parsed.definition;
  }
}
