import { describe, it, expect } from 'vitest'
import * as os from 'os'
import { defaultIdentity } from '../../src/vcs/identity'
import { fakeClient } from '../helpers/fixtures'

describe('defaultIdentity', () => {
  const now = new Date(1700000000000)

  it('uses the configured name and email', async () => {
    const identity = await defaultIdentity(fakeClient({ 'user.name': 'Test User', 'user.email': 'test@example.com' }), now)
    expect(identity.name).toBe('Test User')
    expect(identity.email).toBe('test@example.com')
    expect(identity.timestamp).toBe(1700000000)
  })

  it('falls back to the login name and host', async () => {
    const login = os.userInfo().username
    const identity = await defaultIdentity(fakeClient({}), now)
    expect(identity.name).toBe(login)
    expect(identity.email).toBe(`${login}@${os.hostname()}`)
  })

  it('mixes configured and fallback values', async () => {
    const identity = await defaultIdentity(fakeClient({ 'user.name': 'Only Name' }), now)
    expect(identity.name).toBe('Only Name')
    expect(identity.email).toBe(`${os.userInfo().username}@${os.hostname()}`)
  })
})
