/**
 * Built-in rejection policies.
 */

import type { RejectionPolicyName } from '../config/config-schema.js'
import type { RejectionPolicy } from './orchestrator.js'

/** Rejected work stays failed until someone runs `retry` */
export const failPolicy: RejectionPolicy = {
  name: 'fail',
  decide: () => 'fail',
}

/** Requeue a rejected task until it has been retried `maxRequeues` times */
export function requeuePolicy(maxRequeues: number): RejectionPolicy {
  return {
    name: 'requeue',
    // attempt 1 is the original run, so attempt N has been requeued N - 1 times
    decide: (task) => (task.attempt <= maxRequeues ? 'requeue' : 'fail'),
  }
}

export function rejectionPolicyFromConfig(
  name: RejectionPolicyName,
  maxRequeues: number,
): RejectionPolicy {
  return name === 'requeue' ? requeuePolicy(maxRequeues) : failPolicy
}
