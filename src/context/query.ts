/**
 * Query Constructor
 *
 * Turns an inbound message into the single text turn sent to the model, e.g.
 *   @alice said "look at this" while sending attachments: while quoting @bob "earlier"
 */

export interface QuotedContent {
  authorName: string
  text: string
}

export interface QueryInput {
  authorName: string
  messageText: string
  hasAttachments: boolean
  quoted?: QuotedContent | null
}

/**
 * Reduce Discord markup to what a reader sees.
 *
 * Custom emoji keep their name (`<:wave:123>` → `:wave:`), slash command
 * mentions keep the command (`</ping:123>` → `/ping`) and suppressed-embed
 * links keep the URL. Raw user/role/channel mentions, timestamps and guild
 * navigation tokens have no readable name in the text and are removed.
 */
export function sanitizeContent(text: string): string {
  return text
    .replace(/<a?:(\w+):\d+>/g, ':$1:')
    .replace(/<\/([\w -]+):\d+>/g, '/$1')
    .replace(/<(https?:\/\/[^\s<>]+)>/g, '$1')
    .replace(/<(?:@[!&]?\d+|#\d+|t:-?\d+(?::[tTdDfFR])?|id:\w+)>/g, '')
    .replace(/ {2,}/g, ' ')
    .trim()
}

export function buildQuery(input: QueryInput): string {
  const author = input.authorName
  const text = sanitizeContent(input.messageText)

  let query: string
  if (!input.hasAttachments) {
    query = `@${author} said "${text}"`
  } else if (!text) {
    query = `@${author} sent attachments:`
  } else {
    query = `@${author} said "${text}" while sending attachments:`
  }

  if (input.quoted) {
    query = `${query} while quoting @${input.quoted.authorName} "${sanitizeContent(input.quoted.text)}"`
  }

  return query
}
