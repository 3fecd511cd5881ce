/**
 * Object Store Factory
 *
 * Opens the store for a repository path. Stores are cached per repository
 * root so repeated analyses share isomorphic-git's object cache.
 */

import { log } from '@shared/logger'
import fs from 'fs'
import git from 'isomorphic-git'
import path from 'path'
import { NotFoundError } from '../../shared/errors'
import type { ObjectStore } from './interface'
import { IsomorphicGitStore } from './IsomorphicGitStore'

const cachedStores = new Map<string, ObjectStore>()

/**
 * Find the repository root containing `repoPath` and open a store on it.
 *
 * @throws NotFoundError when `repoPath` is not inside a git repository
 */
export async function openStore(repoPath: string): Promise<ObjectStore> {
  let root: string
  try {
    root = await git.findRoot({ fs, filepath: path.resolve(repoPath) })
  } catch (error) {
    throw new NotFoundError(`Not a git repository: ${repoPath}`, 'file', error)
  }

  const cached = cachedStores.get(root)
  if (cached) return cached

  const store = new IsomorphicGitStore(root)
  cachedStores.set(root, store)
  log.debug(`[ObjectStore] Opened ${store.name} store at ${root}`)
  return store
}

/**
 * Drop cached stores, e.g. after the repository changed on disk.
 */
export function resetStores(): void {
  cachedStores.clear()
}
