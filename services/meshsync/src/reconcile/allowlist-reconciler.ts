import { hasProxyPort } from '~/kube/workloads'
import { ALLOWLIST_KIND, LABEL_CLUSTER } from '~/wellknown'
import type { PodSetReconciler } from './types'

const sameList = (left: string[], right: string[]) =>
  left.length === right.length && left.every((value, index) => value === right[index])

export type AllowlistReconciler = PodSetReconciler & {
  recorded: () => string[]
}

/**
 * Keeps the ingress allowlist listener in step with the set of clusters that currently run a
 * sidecar. Dispatches only when the sorted set is non-empty and differs from the last one sent.
 */
export const createAllowlistReconciler = (): AllowlistReconciler => {
  let recorded: string[] = []

  const reconcile: PodSetReconciler = async (pods, context) => {
    const clusters = new Set<string>()
    for (const pod of pods) {
      const label = pod.metadata?.labels?.[LABEL_CLUSTER]
      if (label && hasProxyPort(pod.spec?.containers)) clusters.add(label)
    }
    const sorted = [...clusters].sort()
    if (sorted.length === 0 || sameList(sorted, recorded)) return

    context.logger.info({ clusters: sorted }, 'sidecar set changed; updating ingress allowlist')
    const listener = await context.evaluator.renderAllowlist(sorted)
    if (listener === null) {
      context.logger.warn('no allowlist template in the desired-state tree')
      return
    }
    if (context.commands.applyAll([listener], [ALLOWLIST_KIND]) > 0) {
      recorded = sorted
    }
  }

  return Object.assign(reconcile, { recorded: () => [...recorded] })
}
