export type ImportRowError = {
  row: number; // 1-based data row
  message: string;
};

export type ImportResult = {
  commit: boolean;
  totalRows: number;
  validRows: number;
  importedRows: number;
  skippedRows: number;
  errors: ImportRowError[];
};

export type ExportFormat = "csv" | "json";
