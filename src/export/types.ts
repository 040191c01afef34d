export interface ExportResult {
  format: "xlsx" | "csv";
  files: string[];      // written paths, in sheet order for csv
  units: number;        // Summary rows
  items: number;        // Details rows
  suppressions: number; // Suppressed Messages rows
}
