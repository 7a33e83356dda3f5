// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService } from './ingestion.service';
export type { BatchIngestionResult } from './ingestion.service';
export { ReadingValidator } from './reading.validator';
