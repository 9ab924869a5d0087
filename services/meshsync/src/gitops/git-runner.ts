import { spawn } from 'node:child_process'

export type GitCommandResult = {
  exitCode: number
  stdout: string
  stderr: string
}

export type GitCommandOptions = {
  cwd?: string
  env?: Record<string, string>
}

export type GitRunner = (args: string[], options?: GitCommandOptions) => Promise<GitCommandResult>

export class GitCommandError extends Error {
  readonly args: string[]
  readonly exitCode: number
  readonly stderr: string

  constructor(args: string[], result: GitCommandResult) {
    const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`
    super(`git ${args[0] ?? ''} failed: ${detail}`)
    this.name = 'GitCommandError'
    this.args = args
    this.exitCode = result.exitCode
    this.stderr = result.stderr
  }
}

export const runGitCommand: GitRunner = (args, options = {}) =>
  new Promise((resolve) => {
    const child = spawn('git', args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    })
    let stdout = ''
    let stderr = ''

    child.stdout?.on('data', (chunk) => {
      stdout += chunk.toString()
    })
    child.stderr?.on('data', (chunk) => {
      stderr += chunk.toString()
    })
    child.on('error', (error) => {
      resolve({ exitCode: 1, stdout: '', stderr: error.message })
    })
    child.on('close', (exitCode) => {
      resolve({ exitCode: exitCode ?? 1, stdout, stderr })
    })
  })

/** Runs git and returns trimmed stdout, throwing GitCommandError on a non-zero exit. */
export const git = async (runner: GitRunner, args: string[], options?: GitCommandOptions) => {
  const result = await runner(args, options)
  if (result.exitCode !== 0) {
    throw new GitCommandError(args, result)
  }
  return result.stdout.trim()
}
