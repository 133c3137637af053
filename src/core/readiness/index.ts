export {
  evaluateReadiness,
  ReadinessEvaluatorRegistry,
  registerReadinessEvaluator,
} from './registry.js';
