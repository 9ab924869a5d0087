import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export type SshCredentials = {
  privateKeyPath: string
  passphrase: string | null
}

export type GitAuth = {
  env: Record<string, string>
  dispose: () => Promise<void>
}

export const PASSPHRASE_ENV = 'MESHSYNC_GIT_SSH_PASSPHRASE'

const ASKPASS_SCRIPT = `#!/bin/sh\nprintf '%s\\n' "$${PASSPHRASE_ENV}"\n`

export const shellQuote = (value: string) => `'${value.replaceAll("'", `'\\''`)}'`

export const sshCommand = (privateKeyPath: string) =>
  `ssh -i ${shellQuote(privateKeyPath)} -o IdentitiesOnly=yes -o StrictHostKeyChecking=accept-new`

/**
 * Builds the environment git needs to authenticate. A passphrase is fed to ssh through a
 * throwaway SSH_ASKPASS helper that echoes it from the environment.
 */
export const prepareGitAuth = async (ssh: SshCredentials | null): Promise<GitAuth> => {
  const env: Record<string, string> = { GIT_TERMINAL_PROMPT: '0' }
  if (!ssh) {
    return { env, dispose: async () => {} }
  }

  env.GIT_SSH_COMMAND = sshCommand(ssh.privateKeyPath)
  if (!ssh.passphrase) {
    return { env, dispose: async () => {} }
  }

  const dir = await mkdtemp(join(tmpdir(), 'meshsync-askpass-'))
  const helper = join(dir, 'askpass.sh')
  await writeFile(helper, ASKPASS_SCRIPT, 'utf8')
  await chmod(helper, 0o700)
  env.SSH_ASKPASS = helper
  env.SSH_ASKPASS_REQUIRE = 'force'
  env.DISPLAY = process.env.DISPLAY ?? ':0'
  env[PASSPHRASE_ENV] = ssh.passphrase

  return {
    env,
    dispose: () => rm(dir, { recursive: true, force: true }),
  }
}
