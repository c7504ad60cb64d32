import type { Annotation, RestaurantIdentity } from "../domain/records.js";

export type RawRow = Record<string, string>;

export type StoredAnnotation = {
  group: string;
  locations: string;
  verified: string;
};

export interface DatasetAdapter {
  annotationColumns(): string[];
  parseRow(row: RawRow): RestaurantIdentity | null;
  readAnnotation(row: RawRow): StoredAnnotation;
  writeAnnotation(row: RawRow, annotation: Annotation): void;
}
