import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Processed Documents Table (the ledger)
export interface ProcessedDocuments {
  id: Generated<number>; // SERIAL
  document_id: string; // UNIQUE
  name: string;
  document_date: Timestamp;
  portfolio_id: string;
  processed_at: Timestamp;
  message_sent: Generated<boolean>;
  error_message: string | null;
}

// Last Query Timestamps Table (the watermark)
export interface LastQueryTimestamps {
  id: Generated<number>; // SERIAL
  last_successful_query: Timestamp;
  updated_at: Timestamp;
}

// Database Schema Interface
// Note: Keys must be lowercase to match PostgreSQL's default identifier handling.
export interface NotifierDatabase {
  processed_documents: ProcessedDocuments;
  last_query_timestamps: LastQueryTimestamps;
}
