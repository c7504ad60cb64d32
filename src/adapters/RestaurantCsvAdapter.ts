import type { DatasetAdapter, RawRow, StoredAnnotation } from "./DatasetAdapter.js";
import type { Annotation, RestaurantIdentity } from "../domain/records.js";

export type RestaurantColumns = {
  name: string;
  market: string;
  domain: string;
  group: string;
  locations: string;
  verified: string;
};

export const DEFAULT_COLUMNS: RestaurantColumns = {
  name: "Company name",
  market: "Macro Geo (NYC, SF, CHS, DC, LA, NASH, DEN)",
  domain: "Company Domain Name",
  group: "Hospitality Group",
  locations: "Total Locations",
  verified: "Verified"
};

function clean(s?: string): string {
  return (s ?? "").toString().trim();
}

export class RestaurantCsvAdapter implements DatasetAdapter {
  constructor(private readonly columns: RestaurantColumns = DEFAULT_COLUMNS) {}

  annotationColumns(): string[] {
    return [this.columns.group, this.columns.locations, this.columns.verified];
  }

  parseRow(row: RawRow): RestaurantIdentity | null {
    const name = clean(row[this.columns.name]);
    if (!name) return null;

    return {
      name,
      market: clean(row[this.columns.market]) || undefined,
      domain: clean(row[this.columns.domain]) || undefined
    };
  }

  readAnnotation(row: RawRow): StoredAnnotation {
    return {
      group: clean(row[this.columns.group]),
      locations: clean(row[this.columns.locations]),
      verified: clean(row[this.columns.verified])
    };
  }

  writeAnnotation(row: RawRow, a: Annotation): void {
    row[this.columns.group] = a.group;
    row[this.columns.locations] = a.locations;
    row[this.columns.verified] = a.verified;
  }
}
