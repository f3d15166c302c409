import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CATEGORIES } from "../types.js";
import { createLogger } from "../logger.js";

const log = createLogger("jurisdictions");

const boundsSchema = z
  .object({
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
    minLng: z.number().min(-180).max(180),
    maxLng: z.number().min(-180).max(180)
  })
  .refine((b) => b.minLat <= b.maxLat && b.minLng <= b.maxLng, { message: "min bound exceeds max bound" });

const unitSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  categories: z.union([z.literal("*"), z.array(z.enum(CATEGORIES)).min(1)]),
  bounds: boundsSchema
});

export const jurisdictionTableSchema = z
  .object({
    units: z.array(unitSchema)
  })
  .refine((table) => new Set(table.units.map((unit) => unit.id)).size === table.units.length, {
    message: "unit ids must be unique"
  });

export type GovernmentUnit = z.infer<typeof unitSchema>;
export type JurisdictionTable = z.infer<typeof jurisdictionTableSchema>;

/**
 * Process-wide jurisdiction table. Loaded once, replaced wholesale on reload so readers
 * never observe a half-updated table.
 */
export class JurisdictionRegistry {
  private table: JurisdictionTable;

  constructor(table: JurisdictionTable, private readonly sourcePath?: string) {
    this.table = jurisdictionTableSchema.parse(table);
  }

  static fromFile(filePath: string): JurisdictionRegistry {
    const resolved = path.resolve(process.cwd(), filePath);
    return new JurisdictionRegistry(readTable(resolved), resolved);
  }

  get units(): readonly GovernmentUnit[] {
    return this.table.units;
  }

  unit(id: string): GovernmentUnit | undefined {
    return this.table.units.find((unit) => unit.id === id);
  }

  replace(table: JurisdictionTable) {
    this.table = jurisdictionTableSchema.parse(table);
    log.info("Jurisdiction table replaced", { units: this.table.units.length });
  }

  reload() {
    if (!this.sourcePath) throw new Error("Registry was not loaded from a file");
    this.replace(readTable(this.sourcePath));
  }
}

function readTable(filePath: string): JurisdictionTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return jurisdictionTableSchema.parse(raw);
}
