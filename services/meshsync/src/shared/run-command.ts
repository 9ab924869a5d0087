import { spawn } from 'node:child_process'

export type CommandResult = {
  stdout: string
  stderr: string
  exitCode: number | null
}

export type CommandRunner = (command: string, args: string[], input?: string) => Promise<CommandResult>

export const runCommand: CommandRunner = (command, args, input) =>
  new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    child.stdout.setEncoding('utf8')
    child.stderr.setEncoding('utf8')
    child.stdout.on('data', (chunk) => {
      stdout += chunk
    })
    child.stderr.on('data', (chunk) => {
      stderr += chunk
    })
    child.on('error', (error) => resolve({ stdout, stderr: error.message, exitCode: 1 }))
    child.on('close', (code) => resolve({ stdout, stderr, exitCode: code }))
    if (input) {
      child.stdin.write(input)
    }
    child.stdin.end()
  })
