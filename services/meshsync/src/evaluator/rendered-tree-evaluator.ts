import { readdir, readFile } from 'node:fs/promises'
import { extname, join, relative } from 'node:path'
import { parseAllDocuments } from 'yaml'
import { z } from 'zod'

import type { ConfigCandidate } from '~/change-set/object-refs'
import { isContainer, isVolume, isWorkloadManifest, type WorkloadManifest } from '~/kube/workloads'
import { componentLogger, type Logger } from '~/logger'
import { asRecord } from '~/shared/records'
import { type ConfigEvaluator, type MeshDescription, meshDescriptionSchema } from './evaluator'
import { renderTemplate, type TemplateContext } from './template'

export const TREE_LAYOUT = {
  mesh: 'mesh.yaml',
  config: 'config',
  manifests: 'manifests',
  sidecar: join('templates', 'sidecar.yaml'),
  sidecarConfig: join('templates', 'sidecar-config.yaml'),
  allowlist: join('templates', 'allowlist.yaml'),
} as const

const DOCUMENT_EXTENSIONS = new Set(['.yaml', '.yml', '.json'])

const sidecarConfigEntrySchema = z.object({
  kind: z.string().min(1),
  object: z.record(z.unknown()),
})

export class TreeEvaluationError extends Error {
  constructor(source: string, message: string) {
    super(`${source}: ${message}`)
    this.name = 'TreeEvaluationError'
  }
}

const isMissing = (error: unknown) => asRecord(error)?.code === 'ENOENT'

const readOptional = async (path: string) => {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (isMissing(error)) return null
    throw error
  }
}

const listDir = async (dir: string) => {
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    return entries.sort((a, b) => a.name.localeCompare(b.name))
  } catch (error) {
    if (isMissing(error)) return []
    throw error
  }
}

const collectDocumentFiles = async (dir: string): Promise<string[]> => {
  const files: string[] = []
  for (const entry of await listDir(dir)) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await collectDocumentFiles(path)))
    } else if (entry.isFile() && DOCUMENT_EXTENSIONS.has(extname(entry.name))) {
      files.push(path)
    }
  }
  return files
}

/** Parses every YAML document in `text`; a top-level list contributes each of its items. */
export const parseDocuments = (text: string, source: string): unknown[] => {
  const values: unknown[] = []
  for (const document of parseAllDocuments(text)) {
    if (document.errors.length > 0) {
      throw new TreeEvaluationError(source, document.errors.map((error) => error.message).join('; '))
    }
    const value: unknown = document.toJS()
    if (value == null) continue
    if (Array.isArray(value)) {
      values.push(...value)
    } else {
      values.push(value)
    }
  }
  return values
}

export type RenderedTreeEvaluatorOptions = {
  root: string
  logger?: Logger
}

/**
 * Reads desired state from a synced checkout laid out as {@link TREE_LAYOUT}. Every file is
 * rendered against `{ mesh }` (plus `cluster`, `port` or `clusters` for the templates) before
 * it is parsed.
 */
export const createRenderedTreeEvaluator = (options: RenderedTreeEvaluatorOptions): ConfigEvaluator => {
  const { root } = options
  const log = options.logger ?? componentLogger('evaluator')

  const describeMesh = async (): Promise<MeshDescription> => {
    const source = TREE_LAYOUT.mesh
    const text = await readOptional(join(root, source))
    if (text === null) {
      throw new TreeEvaluationError(source, 'file not found')
    }
    const [document] = parseDocuments(text, source)
    const parsed = meshDescriptionSchema.safeParse(document)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      throw new TreeEvaluationError(source, issues.join('; '))
    }
    return parsed.data
  }

  const renderFile = async (path: string, context: TemplateContext) => {
    const text = await readFile(path, 'utf8')
    return parseDocuments(renderTemplate(text, context), relative(root, path))
  }

  const renderOptionalTemplate = async (source: string, context: TemplateContext) => {
    const text = await readOptional(join(root, source))
    if (text === null) return null
    return parseDocuments(renderTemplate(text, { mesh: await describeMesh(), ...context }), source)
  }

  const renderConfigs = async (context: TemplateContext) => {
    const candidates: ConfigCandidate[] = []
    for (const entry of await listDir(join(root, TREE_LAYOUT.config))) {
      if (!entry.isDirectory()) continue
      const kind = entry.name
      for (const path of await collectDocumentFiles(join(root, TREE_LAYOUT.config, kind))) {
        for (const value of await renderFile(path, context)) {
          if (!asRecord(value)) {
            log.warn({ file: relative(root, path), kind }, 'skipping non-object configuration document')
            continue
          }
          candidates.push({ raw: JSON.stringify(value), kind })
        }
      }
    }
    return candidates
  }

  const renderManifests = async (context: TemplateContext) => {
    const manifests: WorkloadManifest[] = []
    for (const path of await collectDocumentFiles(join(root, TREE_LAYOUT.manifests))) {
      for (const value of await renderFile(path, context)) {
        if (!isWorkloadManifest(value)) {
          log.warn({ file: relative(root, path) }, 'skipping document without apiVersion, kind and metadata.name')
          continue
        }
        manifests.push(value)
      }
    }
    return manifests
  }

  return {
    describeMesh,
    renderAll: async () => {
      const context = { mesh: await describeMesh() }
      return {
        manifests: await renderManifests(context),
        configs: await renderConfigs(context),
      }
    },
    renderSidecarFor: async (clusterLabel) => {
      const documents = await renderOptionalTemplate(TREE_LAYOUT.sidecar, { cluster: clusterLabel })
      if (!documents) return null
      const fragment = asRecord(documents[0])
      if (!fragment || !isContainer(fragment.container)) {
        throw new TreeEvaluationError(TREE_LAYOUT.sidecar, 'expected a document with a named `container`')
      }
      const volumes = Array.isArray(fragment.volumes) ? fragment.volumes.filter(isVolume) : []
      return { container: fragment.container, volumes }
    },
    renderAllowlist: async (clusterLabels) => {
      const documents = await renderOptionalTemplate(TREE_LAYOUT.allowlist, { clusters: clusterLabels })
      if (!documents) return null
      const listener = asRecord(documents[0])
      if (!listener) {
        throw new TreeEvaluationError(TREE_LAYOUT.allowlist, 'expected a listener object')
      }
      return JSON.stringify(listener)
    },
    renderSidecarConfig: async (clusterLabel, port) => {
      const documents = await renderOptionalTemplate(TREE_LAYOUT.sidecarConfig, { cluster: clusterLabel, port })
      if (!documents) return []
      return documents.map((document) => {
        const entry = sidecarConfigEntrySchema.safeParse(document)
        if (!entry.success) {
          throw new TreeEvaluationError(TREE_LAYOUT.sidecarConfig, 'each document needs `kind` and `object`')
        }
        return { raw: JSON.stringify(entry.data.object), kind: entry.data.kind }
      })
    },
  }
}
