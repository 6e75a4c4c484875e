/**
 * Tidy a description pasted from someone else's listing before it is
 * reused: markup, emoji, shouty punctuation and ragged whitespace go,
 * bullets become "- ".
 */
export function cleanSellerText(text: string): string {
  const normalized = text
    .replace(/\r\n?/g, '\n')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;|\u00a0/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/\p{Extended_Pictographic}|\uFE0F|\u200D/gu, '')
    .replace(/([!?])\1+/g, '$1');

  const lines = normalized.split('\n').map((line) =>
    line
      .replace(/[ \t]+/g, ' ')
      .trim()
      .replace(/^[*•·]\s*/, '- '),
  );

  const kept: string[] = [];
  for (const line of lines) {
    // At most one blank line in a row
    if (line === '' && (kept.length === 0 || kept[kept.length - 1] === '')) continue;
    kept.push(line);
  }
  while (kept[kept.length - 1] === '') kept.pop();

  return kept.join('\n');
}
