const SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** POSIX single-quote a token unless it is made of safe characters only. */
export function shellQuote(token: string): string {
  if (token && SAFE.test(token)) return token;
  return `'${token.replace(/'/g, `'"'"'`)}'`;
}

export function shellJoin(tokens: readonly string[]): string {
  return tokens.map(shellQuote).join(" ");
}

/** Quote for cmd.exe: wrap in double quotes when needed, doubling inner ones. */
export function cmdQuote(token: string): string {
  if (token && /^[A-Za-z0-9_@%+=:,./\\-]+$/.test(token)) return token;
  return `"${token.replace(/"/g, '""')}"`;
}

/**
 * Splits a command line the way a POSIX shell would for simple commands:
 * single quotes are literal, double quotes allow backslash escapes of
 * `"`, `\`, `$` and backtick, and an unquoted backslash escapes the next
 * character. Returns null on an unterminated quote or trailing escape.
 */
export function shellSplit(line: string): string[] | null {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];
    if (ch === "'") {
      const end = line.indexOf("'", i + 1);
      if (end < 0) return null;
      current += line.slice(i + 1, end);
      inToken = true;
      i = end + 1;
    } else if (ch === "\"") {
      i++;
      let closed = false;
      while (i < line.length) {
        const c = line[i];
        if (c === "\"") {
          closed = true;
          i++;
          break;
        }
        if (c === "\\" && i + 1 < line.length && "\"\\$`".includes(line[i + 1])) {
          current += line[i + 1];
          i += 2;
          continue;
        }
        current += c;
        i++;
      }
      if (!closed) return null;
      inToken = true;
    } else if (ch === "\\") {
      if (i + 1 >= line.length) return null;
      current += line[i + 1];
      inToken = true;
      i += 2;
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = "";
      inToken = false;
      i++;
    } else {
      current += ch;
      inToken = true;
      i++;
    }
  }
  if (inToken) tokens.push(current);
  return tokens;
}
