import type { SessionMetrics } from '../types.js';
import { Counters } from './counters.js';

export function buildSessionHealthSummary(metrics: SessionMetrics, managerId: string | undefined, counters: Counters) {
  return {
    session: { state: metrics.state, managerId: managerId ?? null },
    metrics,
    wsCloseByCode: counters.wsCloseTotal,
    publishTotal: counters.publishTotal,
    deliveryTotal: counters.deliveryTotal,
    deliveryFailureTotal: counters.deliveryFailureTotal,
    deliveryTimeoutTotal: counters.deliveryTimeoutTotal,
    admissionTotal: counters.admissionTotal,
    rejectionTotal: counters.rejectionTotal,
    kickTotal: counters.kickTotal
  };
}
