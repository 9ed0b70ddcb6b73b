import type { Logger } from '../lib/logger.js'
import { ClassifierProtocolError } from '../lib/api-errors.js'
import { parseBoolLiteral } from '../lib/bool-literal.js'
import type { StoredComment } from '../comments/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpamClassifier {
  /** Whether a classifier credential is configured. */
  isEnabled(): boolean
  /**
   * Ask for a verdict on a stored comment. Resolves true for spam.
   * Network failures reject; a body that is not a boolean literal rejects
   * with ClassifierProtocolError.
   */
  checkComment(comment: StoredComment): Promise<boolean>
  /** Report a comment a moderator marked as spam. */
  submitSpam(comment: StoredComment): Promise<void>
  /** Report a comment a moderator approved by hand. */
  submitHam(comment: StoredComment): Promise<void>
}

export interface SpamClassifierConfig {
  /** Akismet API key. Undefined or empty disables classification. */
  apiKey: string | undefined
  /** Site the comments belong to, sent as the `blog` field. */
  siteUrl: string
  timeoutMs: number
}

type AkismetMethod = 'comment-check' | 'submit-spam' | 'submit-ham'

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a client for the Akismet REST API. Requests are form-encoded posts of
 * the stored comment fields plus `blog`.
 */
export function createSpamClassifier(config: SpamClassifierConfig, logger: Logger): SpamClassifier {
  const apiKey = config.apiKey
  const enabled = typeof apiKey === 'string' && apiKey.length > 0

  async function post(method: AkismetMethod, comment: StoredComment): Promise<string> {
    if (apiKey === undefined || apiKey === '') {
      throw new Error('spam classifier is not configured')
    }

    const url = `https://${encodeURIComponent(apiKey)}.rest.akismet.com/1.1/${method}`
    const body = new URLSearchParams({ blog: config.siteUrl, ...comment })

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
      signal: AbortSignal.timeout(config.timeoutMs),
    })

    const text = await response.text()
    if (!response.ok) {
      logger.warn({ status: response.status, method }, 'Spam classifier returned non-OK status')
    }
    return text
  }

  return {
    isEnabled(): boolean {
      return enabled
    },

    async checkComment(comment) {
      const text = await post('comment-check', comment)
      const verdict = parseBoolLiteral(text.trim())
      if (verdict === null) {
        throw new ClassifierProtocolError(text)
      }
      return verdict
    },

    async submitSpam(comment) {
      await post('submit-spam', comment)
    },

    async submitHam(comment) {
      await post('submit-ham', comment)
    },
  }
}
