import { simpleGit } from 'simple-git'
import { describeError } from '../../errors.js'
import { cliLogger } from '../../utils/logger.js'

export const FALLBACK_IMAGE_TAG = 'latest'

/** The part of a git client the image tag needs */
export interface RevisionSource {
  revparse(options: string[]): Promise<string>
}

/**
 * Tag for images built by hand: `manual-{short sha}` of the current commit,
 * or `latest` outside a git checkout.
 */
export async function defaultImageTag(git?: RevisionSource): Promise<string> {
  try {
    const source: RevisionSource = git ?? simpleGit()
    const sha = (await source.revparse(['--short', 'HEAD'])).trim()
    if (sha === '') {
      return FALLBACK_IMAGE_TAG
    }
    return `manual-${sha}`
  } catch (error) {
    cliLogger.debug('Could not read the git revision, using the fallback image tag', {
      tag: FALLBACK_IMAGE_TAG,
      reason: describeError(error),
    })
    return FALLBACK_IMAGE_TAG
  }
}
