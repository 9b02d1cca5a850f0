/**
 * Minimal XML lookups over API response bodies.
 */

import sax from 'sax';

/**
 * Text content of the first element named `tag` (case-sensitive).
 * Returns undefined when no such element exists.
 * @throws Error when the body is not well-formed XML.
 */
export function findText(xml: string, tag: string): string | undefined {
  const parser = sax.parser(true, { trim: true });
  let depth = 0;
  let text: string | undefined;
  let done = false;

  parser.onopentag = (node) => {
    if (done) return;
    if (depth > 0) {
      depth++;
    } else if (node.name === tag) {
      depth = 1;
      text = '';
    }
  };
  parser.ontext = (chunk) => {
    if (depth > 0 && !done) text += chunk;
  };
  parser.oncdata = (chunk) => {
    if (depth > 0 && !done) text += chunk;
  };
  parser.onclosetag = () => {
    if (depth === 0 || done) return;
    depth--;
    if (depth === 0) done = true;
  };

  try {
    parser.write(xml).close();
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] : String(err);
    throw new Error(`Malformed XML response: ${reason}`, { cause: err });
  }
  return text;
}
