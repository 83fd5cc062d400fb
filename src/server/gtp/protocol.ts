/**
 * Line-level framing for the Go Text Protocol (version 2).
 *
 * A command is `[id] command_name [arguments]`; a response is `=` or `?`,
 * the echoed id if there was one, a space and the text, terminated by an
 * empty line.
 */

export interface GtpCommand {
  id?: number;
  name: string;
  args: string[];
}

// Control characters other than HT and LF are discarded.
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x08\x0b-\x1f\x7f]/g;

/**
 * Preprocess and split one input line. Returns `null` for lines that are
 * empty once comments and whitespace are removed.
 */
export function parseCommandLine(line: string): GtpCommand | null {
  const hash = line.indexOf('#');
  const withoutComment = hash >= 0 ? line.slice(0, hash) : line;
  const cleaned = withoutComment.replace(CONTROL_CHARS, '').replace(/\t/g, ' ').trim();
  if (cleaned.length === 0) {
    return null;
  }

  const tokens = cleaned.split(/\s+/);
  let id: number | undefined;
  if (/^\d+$/.test(tokens[0])) {
    id = Number(tokens.shift());
  }
  const name = tokens.shift();
  if (name === undefined) {
    // A bare id is still a command; it just names nothing.
    return { id, name: '', args: [] };
  }
  return { id, name, args: tokens };
}

function formatId(id: number | undefined): string {
  return id === undefined ? '' : String(id);
}

export function formatSuccess(id: number | undefined, text: string = ''): string {
  return `=${formatId(id)} ${text}\n\n`;
}

export function formatFailure(id: number | undefined, text: string): string {
  return `?${formatId(id)} ${text}\n\n`;
}
