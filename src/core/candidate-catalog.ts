/**
 * Candidate catalog -- the read-only list of valid candidates supplied at
 * startup.
 *
 * @module candidate-catalog
 * @license AGPL-3.0-or-later
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { CandidateDefinition } from "../types";

export interface CandidateCatalog {
  list(): CandidateDefinition[];
}

const CatalogSchema = z
  .array(
    z.object({
      candidateId: z.string().trim().min(1),
      name: z.string().trim().min(1),
    })
  )
  .min(1);

/**
 * Catalog over a fixed array.
 */
export class StaticCandidateCatalog implements CandidateCatalog {
  private readonly candidates: CandidateDefinition[];

  constructor(candidates: CandidateDefinition[]) {
    this.candidates = CatalogSchema.parse(candidates);
  }

  list(): CandidateDefinition[] {
    return this.candidates.map((c) => ({ ...c }));
  }
}

/**
 * Loads a catalog from a JSON file holding an array of
 * `{ candidateId, name }` objects.
 *
 * @throws ZodError if the file content is not a non-empty candidate list
 */
export function loadCandidateCatalog(filePath: string): CandidateCatalog {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  return new StaticCandidateCatalog(CatalogSchema.parse(raw));
}
