const SECTION_HEADING = /^\d+\.\s+\*{0,2}(.+?)\*{0,2}:/

/**
 * Flatten generated Markdown into plain text for the Jira rich text editor
 * (no markdown, no wiki syntax).
 *
 * - numbered headings such as `1. **Scope**:` become `Scope:`
 * - `-` bullets keep their own line
 * - other consecutive lines are merged into one paragraph
 */
export function formatForJiraRichText(text: string): string {
  const lines = text.replace(/\r/g, '').trim().split('\n')
  const output: string[] = []
  let buffer = ''

  const flush = () => {
    if (buffer) {
      output.push(buffer.trim())
      buffer = ''
    }
  }

  for (const rawLine of lines) {
    const line = rawLine.trim()

    if (!line) {
      flush()
      continue
    }

    const heading = SECTION_HEADING.exec(line)
    if (heading) {
      flush()
      output.push(`${heading[1]}:`)
      continue
    }

    if (line.startsWith('-')) {
      flush()
      output.push(line)
      continue
    }

    buffer += ` ${line}`
  }

  flush()

  return output.join('\n').replace(/\s{2,}/g, ' ')
}
