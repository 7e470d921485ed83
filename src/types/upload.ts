export type ResultRow = {
  serial_nmbr: string;
  board_nmbr: number;
  program: string;
  station: string;
  operator: string | null;
  result: string;
  date_time: string;
  failed: string | null;
  pseudo_error: string | null;
};

export interface ResultsSink {
  insert(rows: ResultRow[]): Promise<void>;
}

export interface UploadSummary {
  uploadedRows: number;
  failedChunks: number;
  allOk: boolean;
}
