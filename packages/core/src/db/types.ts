/**
 * Database types for askdb.
 */

export interface ColumnDescription {
  name: string;
  type: string;
  nullable: boolean;
}

/** Table name → ordered columns. This is what the model sees. */
export type SchemaDescription = Record<string, ColumnDescription[]>;

export interface ColumnInfo extends ColumnDescription {
  primaryKey: boolean;
}

export interface TableInfo {
  name: string;
  rowCount: number;
  columns: ColumnInfo[];
}

export interface SchemaSnapshot {
  tables: TableInfo[];
  capturedAt: Date;
}

export type Row = Record<string, unknown>;
