import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'

export const SNAPSHOT = fileURLToPath(new URL('./fixtures/snapshot.json', import.meta.url))

export const arn = {
  alice: 'arn:aws:iam::111122223333:user/alice',
  bob: 'arn:aws:iam::111122223333:user/bob',
  deployer: 'arn:aws:iam::111122223333:role/deployer',
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'iam-explorer-'))
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}
