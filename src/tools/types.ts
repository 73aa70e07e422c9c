/**
 * Tool Dependencies
 *
 * Collaborators the built-in tools are constructed with.
 */

import type { RandomSource, RetryEvent, RetryPolicy } from '@/core/resilience';
import type { SymptomConditionMap } from '@/core/synthesis';
import type { GraphStore } from '@/providers/graph';
import type { PredictionClient } from '@/providers/prediction';
import type { RecordsSource } from '@/providers/records';

export interface GraphQueryLimits {
  maxQueryLength: number;
  maxMatchClauses: number;
  maxRows: number;
}

export interface ToolDependencies {
  graphStore: GraphStore;
  records: RecordsSource;
  predictions: {
    diabetes: PredictionClient;
    cardio: PredictionClient;
  };
  graphQuery: GraphQueryLimits;
  /** Applied to each prediction service call */
  predictionPolicy: RetryPolicy;
  random?: RandomSource;
  onRetry?: (event: RetryEvent) => void;
  /** Defaults to the curated map shipped in data/ */
  symptomMap?: SymptomConditionMap;
}
