/**
 * Link Builder
 *
 * Reference URLs shown next to catalog rows: the AzAdvertizer page of a
 * definition and the library file declaring an assignment. Pure; returns ''
 * whenever a link cannot be formed.
 */

import {
  AZADVERTIZER_BASE,
  DEFAULT_ASSIGNMENT_PATH,
  DEFAULT_LIBRARY_REF,
  DEFAULT_LIBRARY_REPO,
  GITHUB_WEB_BASE,
} from '../core/constants.js';
import type { TargetKind } from '../core/types.js';
import { assignmentFileCandidates } from '../providers/archetype-library.js';

export interface LinkBuilderOptions {
  readonly azAdvertizerBase?: string;
  readonly githubWebBase?: string;
  readonly repo?: string;
  readonly ref?: string;
  readonly assignmentPath?: string;
}

export class LinkBuilder {
  private readonly azAdvertizerBase: string;
  private readonly githubWebBase: string;
  private readonly repo: string;
  private readonly ref: string;
  private readonly assignmentPath: string;

  constructor(options: LinkBuilderOptions = {}) {
    this.azAdvertizerBase = (options.azAdvertizerBase ?? AZADVERTIZER_BASE).replace(/\/+$/, '');
    this.githubWebBase = (options.githubWebBase ?? GITHUB_WEB_BASE).replace(/\/+$/, '');
    this.repo = options.repo ?? DEFAULT_LIBRARY_REPO;
    this.ref = options.ref ?? DEFAULT_LIBRARY_REF;
    this.assignmentPath = (options.assignmentPath ?? DEFAULT_ASSIGNMENT_PATH).replace(/^\/+|\/+$/g, '');
  }

  /**
   * AzAdvertizer page of a definition
   */
  definitionLink(definitionId: string, kind: TargetKind): string {
    const id = definitionId.trim();
    if (id.length === 0) {
      return '';
    }
    const section = kind === 'Initiative' ? 'azpolicyinitiativesadvertizer' : 'azpolicyadvertizer';
    return `${this.azAdvertizerBase}/${section}/${encodeURIComponent(id)}.html`;
  }

  /**
   * Library template conventionally declaring an assignment
   *
   * Every archetype reads the same template, so the scope only has to be
   * present. Rows keep the URL their source reported when it had one.
   */
  assignmentLink(scope: string, assignmentName: string): string {
    const name = assignmentName.trim();
    if (scope.trim().length === 0 || name.length === 0) {
      return '';
    }
    const [fileName] = assignmentFileCandidates(name);
    return `${this.githubWebBase}/${this.repo}/blob/${encodeURIComponent(this.ref)}/${this.assignmentPath}/${encodeURIComponent(fileName)}`;
  }
}
