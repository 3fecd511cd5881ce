/**
 * Simple-Git Transport
 *
 * RemoteTransport over the git CLI via simple-git. Uses the CLI's own
 * `--force-with-lease` so the remote re-checks the expected tip atomically.
 */

import { log } from '@shared/logger'
import simpleGit, { type SimpleGit } from 'simple-git'
import { GitError } from '../../shared/errors'
import type { PushProgress, RemoteRef, RemoteTransport, TransportPushOptions } from './interface'

export class SimpleGitTransport implements RemoteTransport {
  readonly name = 'simple-git'

  private readonly git: SimpleGit

  /**
   * @param onProgress - receives push progress; never awaited
   */
  constructor(dir: string, onProgress?: (event: PushProgress) => void) {
    this.git = simpleGit({
      baseDir: dir,
      progress: ({ stage, progress }) => onProgress?.({ stage, progress })
    })
  }

  async listRemoteRefs(remote: string, refnames: string[]): Promise<RemoteRef[]> {
    let output: string
    try {
      output = await this.git.listRemote([remote, ...refnames])
    } catch (error) {
      throw this.createError('listRemoteRefs', error)
    }

    const wanted = new Set(refnames)
    return output
      .split('\n')
      .map((line) => line.trim().split(/\s+/))
      .filter((parts) => parts.length === 2)
      .map(([oid, refname]) => ({ oid, refname }))
      .filter((ref) => wanted.size === 0 || wanted.has(ref.refname))
  }

  async push(options: TransportPushOptions): Promise<void> {
    const args: string[] = [options.remote, options.refspec]

    if (options.forceWithLease) {
      const { ref, expect } = options.forceWithLease
      args.push(`--force-with-lease=${ref}:${expect}`)
    } else if (options.force) {
      args.push('--force')
    }

    log.debug(`[SimpleGitTransport] git push ${args.join(' ')}`)
    try {
      await this.git.push(args)
    } catch (error) {
      throw this.createError('push', error)
    }
  }

  private createError(operation: string, originalError: unknown): GitError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitError(
      `[SimpleGitTransport] ${operation} failed: ${message}`,
      operation,
      originalError
    )
  }
}
