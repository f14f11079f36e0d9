export { parseBsubOutput } from "./bsub.ts";
export {
  parseTrainerLoss,
  exponentialSmoothing,
  smoothLoss,
  sampleEvery,
  type SmoothedLossPoint,
} from "./trainer-log.ts";
