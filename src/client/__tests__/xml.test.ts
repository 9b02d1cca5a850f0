import { describe, it, expect } from 'vitest';
import { findText } from '../xml.js';

describe('findText', () => {
  it('returns the text of the first matching element', () => {
    const xml = '<NATION id="testlandia"><SUCCESS>test-token</SUCCESS><SUCCESS>second</SUCCESS></NATION>';
    expect(findText(xml, 'SUCCESS')).toBe('test-token');
  });

  it('returns undefined when the element is absent', () => {
    expect(findText('<NATION><NAME>Testlandia</NAME></NATION>', 'ERROR')).toBeUndefined();
  });

  it('returns an empty string for an empty element', () => {
    expect(findText('<NATION><SUCCESS/></NATION>', 'SUCCESS')).toBe('');
  });

  it('reads CDATA sections', () => {
    expect(findText('<NATION><ERROR><![CDATA[Invalid choice.]]></ERROR></NATION>', 'ERROR')).toBe(
      'Invalid choice.',
    );
  });

  it('decodes entities', () => {
    expect(findText('<R><NAME>Tom &amp; Jerry</NAME></R>', 'NAME')).toBe('Tom & Jerry');
  });

  it('is case-sensitive', () => {
    expect(findText('<R><success>x</success></R>', 'SUCCESS')).toBeUndefined();
  });

  it('throws on malformed XML', () => {
    expect(() => findText('<R><A></R>', 'A')).toThrow(/^Malformed XML response/);
  });
});
