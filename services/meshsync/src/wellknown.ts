// Keys on the pod template that gate reconciler behavior. They are matched verbatim.
export const LABEL_CLUSTER = 'meshsync.io/cluster'
export const LABEL_WORKLOAD = 'meshsync.io/workload'
export const ANNOTATION_INJECT_SIDECAR_TO_PORT = 'meshsync.io/inject-sidecar-to'
export const ANNOTATION_CONFIGURE_SIDECAR = 'meshsync.io/configure-sidecar'

export const PROXY_PORT_NAME = 'proxy'

export const CATALOG_KIND = 'catalogservice'
export const ALLOWLIST_KIND = 'listener'
