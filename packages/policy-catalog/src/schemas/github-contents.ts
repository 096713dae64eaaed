/**
 * GitHub contents API listing schema
 *
 * `GET /repos/{owner}/{repo}/contents/{path}` returns an array of entries;
 * only the fields the archetype source reads are declared.
 */

import { z } from 'zod';

export const GitHubContentEntrySchema = z
  .object({
    type: z.string(),
    name: z.string(),
    path: z.string().optional(),
    download_url: z.string().nullable().optional(),
    html_url: z.string().nullable().optional(),
  })
  .passthrough();

export const GitHubContentListingSchema = z.array(GitHubContentEntrySchema);

export type GitHubContentEntry = z.infer<typeof GitHubContentEntrySchema>;
