/**
 * Kubernetes Autoscaling Resource Factories
 */

export {
  type HorizontalPodAutoscalerPayload,
  horizontalPodAutoscaler,
  horizontalPodAutoscalerReadiness,
} from './horizontal-pod-autoscaler.js';
