import type { Category, GeoPoint, IssueRecord, Report } from "../types.js";
import { GeoGrid, haversineMeters } from "./geo.js";
import { containment, tokenize } from "./text.js";

export interface IssueCandidate {
  issueId: string;
  score: number;
  distanceMeters: number;
  createdAt: string;
}

export type CandidateQuery = Pick<Report, "category" | "description" | "location">;

/**
 * Duplicate detection boundary. Implementations may score however they like as long as the
 * result is sorted by descending score (newest issue first on ties) and scores lie in [0, 1].
 */
export interface SimilarityIndex {
  findCandidates(report: CandidateQuery): Promise<IssueCandidate[]>;
  insert(issue: Pick<IssueRecord, "id" | "category" | "centroid" | "createdAt">, descriptions: readonly string[]): void;
  update(issueId: string, centroid: GeoPoint, description?: string): void;
  remove(issueId: string): void;
  clear(): void;
  readonly size: number;
}

export interface GridIndexOptions {
  radiusMeters: number;
  proximityWeight?: number;
  textWeight?: number;
}

interface Entry {
  id: string;
  category: Category;
  centroid: GeoPoint;
  createdAt: string;
  cell: string;
  vocabulary: Set<string>;
}

export function compareCandidates(a: IssueCandidate, b: IssueCandidate) {
  return b.score - a.score || b.createdAt.localeCompare(a.createdAt) || b.issueId.localeCompare(a.issueId);
}

/**
 * Spatial hash over a lat/lng grid with cell edge equal to the search radius. A lookup touches
 * only the handful of cells overlapping the search disc, independent of how many issues exist.
 */
export class GridSimilarityIndex implements SimilarityIndex {
  readonly grid: GeoGrid;
  private readonly cells = new Map<string, Set<string>>();
  private readonly entries = new Map<string, Entry>();
  private readonly radiusMeters: number;
  private readonly proximityWeight: number;
  private readonly textWeight: number;

  constructor(options: GridIndexOptions) {
    const proximityWeight = options.proximityWeight ?? 0.4;
    const textWeight = options.textWeight ?? 0.6;
    const totalWeight = proximityWeight + textWeight;
    if (totalWeight <= 0) throw new Error("Similarity weights must add up to a positive number");

    this.radiusMeters = options.radiusMeters;
    this.proximityWeight = proximityWeight / totalWeight;
    this.textWeight = textWeight / totalWeight;
    this.grid = new GeoGrid(options.radiusMeters);
  }

  get size() {
    return this.entries.size;
  }

  async findCandidates(report: CandidateQuery): Promise<IssueCandidate[]> {
    const query = tokenize(report.description);
    const candidates: IssueCandidate[] = [];

    for (const cell of this.grid.cellsAround(report.location, this.radiusMeters)) {
      for (const id of this.cells.get(cell) ?? []) {
        const entry = this.entries.get(id);
        if (!entry || entry.category !== report.category) continue;
        const distanceMeters = haversineMeters(report.location, entry.centroid);
        if (distanceMeters > this.radiusMeters) continue;

        const proximity = 1 - distanceMeters / this.radiusMeters;
        const text = containment(query, entry.vocabulary);
        candidates.push({
          issueId: entry.id,
          score: this.proximityWeight * proximity + this.textWeight * text,
          distanceMeters,
          createdAt: entry.createdAt
        });
      }
    }

    return candidates.sort(compareCandidates);
  }

  insert(issue: Pick<IssueRecord, "id" | "category" | "centroid" | "createdAt">, descriptions: readonly string[]) {
    this.remove(issue.id);
    const vocabulary = new Set<string>();
    for (const description of descriptions) {
      for (const token of tokenize(description)) vocabulary.add(token);
    }
    const entry: Entry = {
      id: issue.id,
      category: issue.category,
      centroid: issue.centroid,
      createdAt: issue.createdAt,
      cell: this.grid.cellOf(issue.centroid),
      vocabulary
    };
    this.entries.set(entry.id, entry);
    this.addToCell(entry.cell, entry.id);
  }

  update(issueId: string, centroid: GeoPoint, description?: string) {
    const entry = this.entries.get(issueId);
    if (!entry) return;
    const cell = this.grid.cellOf(centroid);
    if (cell !== entry.cell) {
      this.removeFromCell(entry.cell, issueId);
      this.addToCell(cell, issueId);
      entry.cell = cell;
    }
    entry.centroid = centroid;
    if (description) {
      for (const token of tokenize(description)) entry.vocabulary.add(token);
    }
  }

  remove(issueId: string) {
    const entry = this.entries.get(issueId);
    if (!entry) return;
    this.removeFromCell(entry.cell, issueId);
    this.entries.delete(issueId);
  }

  clear() {
    this.cells.clear();
    this.entries.clear();
  }

  private addToCell(cell: string, id: string) {
    const members = this.cells.get(cell);
    if (members) members.add(id);
    else this.cells.set(cell, new Set([id]));
  }

  private removeFromCell(cell: string, id: string) {
    const members = this.cells.get(cell);
    if (!members) return;
    members.delete(id);
    if (members.size === 0) this.cells.delete(cell);
  }
}
