import { OperatorConfigError } from '~/errors'

export const DEFAULT_BRANCH = 'main'

export type RepoRef = { type: 'branch'; name: string } | { type: 'tag'; name: string }

export const resolveRepoRef = (input: { branch?: string | null; tag?: string | null }): RepoRef => {
  const branch = input.branch?.trim() ?? ''
  const tag = input.tag?.trim() ?? ''
  if (branch && tag) {
    throw new OperatorConfigError(`set a git branch or a git tag, not both (branch=${branch}, tag=${tag})`)
  }
  if (tag) return { type: 'tag', name: tag }
  return { type: 'branch', name: branch || DEFAULT_BRANCH }
}

export const describeRepoRef = (ref: RepoRef) => `${ref.type} ${ref.name}`
