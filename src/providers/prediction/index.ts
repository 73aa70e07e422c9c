export {
  type FetchFn,
  PredictionClient,
  type PredictionService,
  PredictionServiceError
} from './client';
