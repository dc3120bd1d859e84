import * as os from 'os'
import { createIdentity, type Identity } from '../types/objects'
import type { VersionControlClient } from './client'

/**
 * Identity for new commits: `user.name` and `user.email` from the client's
 * configuration, falling back to the OS login name and `<login>@<hostname>`.
 * The timestamp is the current time.
 */
export async function defaultIdentity(client: VersionControlClient, now: Date = new Date()): Promise<Identity> {
  const [configName, configEmail] = await Promise.all([
    client.configGet('user.name'),
    client.configGet('user.email'),
  ])

  let login: string | undefined
  const loginName = (): string => {
    login ??= os.userInfo().username
    return login
  }

  const name = configName ?? loginName()
  const email = configEmail ?? `${loginName()}@${os.hostname()}`
  return createIdentity(name, email, now)
}
