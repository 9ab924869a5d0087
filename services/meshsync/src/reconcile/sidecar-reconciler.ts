import {
  describeResource,
  hasProxyPort,
  type PodTemplateWorkload,
  podTemplateOf,
  templateAnnotations,
  templateLabels,
} from '~/kube/workloads'
import { ANNOTATION_INJECT_SIDECAR_TO_PORT, LABEL_CLUSTER } from '~/wellknown'
import type { WorkloadReconciler } from './types'

export const createSidecarReconciler =
  (imagePullSecret: string | null): WorkloadReconciler<PodTemplateWorkload> =>
  async (resource, context) => {
    const template = podTemplateOf(resource)
    const spec = template?.spec
    if (!template || !spec) return
    if (!templateAnnotations(template)[ANNOTATION_INJECT_SIDECAR_TO_PORT]) return

    const clusterLabel = templateLabels(template)[LABEL_CLUSTER]
    if (!clusterLabel) {
      context.logger.debug({ resource: describeResource(resource) }, 'no cluster label; skipping sidecar injection')
      return
    }
    // a proxy port means the sidecar is already there
    if (hasProxyPort(spec.containers)) return

    const fragment = await context.evaluator.renderSidecarFor(clusterLabel)
    if (!fragment) {
      context.logger.warn({ cluster: clusterLabel }, 'no sidecar template in the desired-state tree')
      return
    }

    spec.containers = [...spec.containers, fragment.container]
    spec.volumes = [...(spec.volumes ?? []), ...fragment.volumes]
    const pullSecrets = spec.imagePullSecrets ?? []
    if (imagePullSecret && !pullSecrets.some((secret) => secret.name === imagePullSecret)) {
      spec.imagePullSecrets = [...pullSecrets, { name: imagePullSecret }]
    }

    context.logger.info({ resource: describeResource(resource), cluster: clusterLabel }, 'injecting sidecar')
    await context.client.apply(resource, 'createOrUpdate')
  }
