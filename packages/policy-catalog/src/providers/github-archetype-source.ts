/**
 * GitHub Archetype Source
 *
 * Reads archetype and policy assignment declarations from the Enterprise-Scale
 * Landing Zone terraform module library through the GitHub contents API.
 *
 * Data Source:
 * - https://github.com/Azure/terraform-azurerm-caf-enterprise-scale
 *   `modules/archetypes/lib/archetype_definitions` (archetypes)
 *   `modules/archetypes/lib/policy_assignments` (assignment templates)
 *
 * Requests are paced through the source's own RequestPacer. Unauthenticated
 * API use is limited to 60 requests per hour; a token raises that.
 */

import {
  DEFAULT_ARCHETYPE_PATH,
  DEFAULT_ASSIGNMENT_PATH,
  DEFAULT_LIBRARY_REF,
  DEFAULT_LIBRARY_REPO,
  GITHUB_API_BASE,
} from '../core/constants.js';
import type { HTTPClient } from '../core/http-client.js';
import { createLogger, type ComponentLogger } from '../core/utils/logger.js';
import { GitHubContentListingSchema, type GitHubContentEntry } from '../schemas/github-contents.js';
import { formatIssues } from '../schemas/raw-documents.js';
import {
  isArchetypeFileName,
  matchAssignmentFile,
  parseArchetypeFile,
  parseLibraryJSON,
} from './archetype-library.js';
import type { RequestPacer } from './request-pacer.js';
import type { ArchetypeDeclaration, ArchetypeSource, RawAssignmentRecord } from './types.js';

export interface GitHubArchetypeSourceOptions {
  readonly client: HTTPClient;
  readonly pacer: RequestPacer;
  /** `owner/name` (default: the Enterprise-Scale terraform module) */
  readonly repo?: string;
  readonly ref?: string;
  readonly apiBase?: string;
  readonly archetypePath?: string;
  readonly assignmentPath?: string;
  /** Personal access token; sent as a bearer token when present */
  readonly token?: string;
  readonly logger?: ComponentLogger;
}

interface LibraryFile {
  readonly name: string;
  readonly downloadUrl: string;
  readonly htmlUrl: string;
}

export class GitHubArchetypeSource implements ArchetypeSource {
  readonly name = 'github';

  private readonly client: HTTPClient;
  private readonly pacer: RequestPacer;
  private readonly repo: string;
  private readonly ref: string;
  private readonly apiBase: string;
  private readonly archetypePath: string;
  private readonly assignmentPath: string;
  private readonly token: string | undefined;
  private readonly log: ComponentLogger;

  constructor(options: GitHubArchetypeSourceOptions) {
    this.client = options.client;
    this.pacer = options.pacer;
    this.repo = options.repo ?? DEFAULT_LIBRARY_REPO;
    this.ref = options.ref ?? DEFAULT_LIBRARY_REF;
    this.apiBase = (options.apiBase ?? GITHUB_API_BASE).replace(/\/+$/, '');
    this.archetypePath = options.archetypePath ?? DEFAULT_ARCHETYPE_PATH;
    this.assignmentPath = options.assignmentPath ?? DEFAULT_ASSIGNMENT_PATH;
    this.token = options.token;
    this.log = options.logger ?? createLogger({ module: 'github-archetype-source' });
  }

  /**
   * Enumerate archetypes and resolve every assignment they declare
   *
   * Each assignment file is downloaded once, however many archetypes
   * reference it. An assignment whose file cannot be located or read is
   * returned with a null document.
   */
  async fetchArchetypes(): Promise<ArchetypeDeclaration[]> {
    const declared = await this.fetchArchetypeDeclarations();
    if (declared.size === 0) {
      return [];
    }

    const files = await this.listDirectory(this.assignmentPath);
    const fileNames = files.map((file) => file.name);
    const filesByName = new Map(files.map((file) => [file.name, file]));
    const documents = new Map<string, RawAssignmentRecord>();

    const archetypes: ArchetypeDeclaration[] = [];
    for (const [archetype, assignmentNames] of declared) {
      const assignments: RawAssignmentRecord[] = [];
      for (const assignmentName of assignmentNames) {
        let record = documents.get(assignmentName);
        if (record === undefined) {
          const fileName = matchAssignmentFile(assignmentName, fileNames);
          const file = fileName === null ? undefined : filesByName.get(fileName);
          record = await this.fetchAssignment(assignmentName, file);
          documents.set(assignmentName, record);
        }
        assignments.push(record);
      }
      archetypes.push({ name: archetype, assignments });
    }

    this.log.info('Loaded archetype library', {
      repo: this.repo,
      ref: this.ref,
      archetypes: archetypes.length,
      assignmentFiles: documents.size,
    });
    return archetypes;
  }

  /**
   * Archetype name → assignment names across all archetype files
   *
   * Archetypes declaring no assignments are left out.
   */
  private async fetchArchetypeDeclarations(): Promise<Map<string, readonly string[]>> {
    const files = await this.listDirectory(this.archetypePath);
    const declared = new Map<string, readonly string[]>();

    for (const file of files) {
      if (!isArchetypeFileName(file.name)) continue;

      const content = await this.fetchText(file.downloadUrl);
      if (content === null) {
        this.log.warn('Archetype file not found', { file: file.name });
        continue;
      }

      const parsed = parseArchetypeFile(content);
      if (!parsed.success) {
        this.log.warn('Skipping unreadable archetype file', { file: file.name, error: parsed.error });
        continue;
      }

      for (const [archetype, assignments] of parsed.archetypes) {
        if (assignments.length === 0) {
          this.log.debug('Archetype declares no assignments', { archetype });
          continue;
        }
        declared.set(archetype, assignments);
      }
    }

    return declared;
  }

  private async fetchAssignment(
    assignmentName: string,
    file: LibraryFile | undefined
  ): Promise<RawAssignmentRecord> {
    if (file === undefined) {
      this.log.warn('Could not find file for assignment', { assignmentName });
      return { referenceName: assignmentName, document: null, sourceUrl: '' };
    }

    try {
      const content = await this.fetchText(file.downloadUrl);
      return {
        referenceName: assignmentName,
        document: content === null ? null : parseLibraryJSON(content),
        sourceUrl: file.htmlUrl,
      };
    } catch (error) {
      this.log.warn('Failed to read assignment file', {
        assignmentName,
        file: file.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return { referenceName: assignmentName, document: null, sourceUrl: file.htmlUrl };
    }
  }

  /**
   * Files of a library directory (sub-directories and entries without a
   * download URL are dropped)
   */
  private async listDirectory(path: string): Promise<LibraryFile[]> {
    const url = `${this.apiBase}/repos/${this.repo}/contents/${path}?ref=${encodeURIComponent(this.ref)}`;
    await this.pacer.wait();
    const listing = await this.client.fetchJSON(url, { headers: this.headers() });

    const parsed = GitHubContentListingSchema.safeParse(listing);
    if (!parsed.success) {
      throw new Error(`Unexpected contents listing for ${path}: ${formatIssues(parsed.error).join('; ')}`);
    }

    return parsed.data.filter(isDownloadableFile).map((entry) => ({
      name: entry.name,
      downloadUrl: entry.download_url,
      htmlUrl: entry.html_url ?? '',
    }));
  }

  private async fetchText(url: string): Promise<string | null> {
    await this.pacer.wait();
    return this.client.fetchTextOrNull(url, { headers: this.headers() });
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }
}

function isDownloadableFile(
  entry: GitHubContentEntry
): entry is GitHubContentEntry & { download_url: string } {
  return entry.type === 'file' && typeof entry.download_url === 'string' && entry.download_url.length > 0;
}
