import { describe, expect, it } from 'vitest';
import { cleanHtml } from '../html_cleaner.js';

describe('cleanHtml', () => {
  it('removes tags and collapses whitespace', () => {
    expect(cleanHtml('<p>  Inspection <b>alone</b>\n\tis allowed.</p>')).toBe('Inspection alone is allowed.');
  });

  it('joins text split by inline tags without adding spaces', () => {
    expect(cleanHtml('group<sup>III</sup>')).toBe('groupIII');
  });

  it('decodes common entities', () => {
    expect(cleanHtml('A&nbsp;&amp;&nbsp;B &lt;1 kV&gt;')).toBe('A & B <1 kV>');
  });

  it('returns an empty string for markup without text', () => {
    expect(cleanHtml('<br/> <hr>')).toBe('');
    expect(cleanHtml('')).toBe('');
  });
});
