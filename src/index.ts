export * from './lib';
export * from './api';
export type {
  TrackMetadata,
  Candidate,
  ExtractionResult,
  WeightTable,
  Result,
} from './types';
