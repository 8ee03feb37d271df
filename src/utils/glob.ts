function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Compile a shell-style name pattern: `*` matches any run of characters,
 * `?` exactly one, and `[abc]`, `[a-z]` or `[!abc]` a character class.
 * An unclosed `[` matches itself.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '*') {
      source += '.*';
      i++;
    } else if (ch === '?') {
      source += '.';
      i++;
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        i++;
        continue;
      }
      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith('!')) {
        negate = true;
        body = body.slice(1);
      }
      const escaped = body.replace(/[\\\]^]/g, '\\$&');
      source += `[${negate ? '^' : ''}${escaped}]`;
      i = close + 1;
    } else {
      source += escapeRegExp(ch);
      i++;
    }
  }

  return new RegExp(`^${source}$`, 's');
}

export function globMatch(pattern: string, text: string): boolean {
  return globToRegExp(pattern).test(text);
}
