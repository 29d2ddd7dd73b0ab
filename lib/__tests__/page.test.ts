/**
 * Tests for page helpers
 */

import { describe, it, expect } from 'vitest';
import { createPage, extractTitle, extractVisibleText, isAbsoluteHttpUrl, toAbsoluteUrl } from '../page';

describe('Page helpers', () => {
  describe('extractVisibleText', () => {
    it('should drop scripts and styles and collapse whitespace', () => {
      const html = '<style>p { color: red }</style><h1>Acme\n Dental</h1>\n<script>track()</script>\n<p>Open  daily</p>';
      expect(extractVisibleText(html)).toBe('Acme Dental Open daily');
    });
  });

  describe('extractTitle', () => {
    it('should return the trimmed title or an empty string', () => {
      expect(extractTitle('<title>\n  Acme Dental  </title>')).toBe('Acme Dental');
      expect(extractTitle('<p>No title</p>')).toBe('');
    });
  });

  describe('createPage', () => {
    it('should derive visible text when none is given', () => {
      const page = createPage('https://acme.com', '<p>Hi</p>');
      expect(page).toEqual({ url: 'https://acme.com', html: '<p>Hi</p>', visibleText: 'Hi' });
      expect(Object.isFrozen(page)).toBe(true);
    });
  });

  describe('toAbsoluteUrl', () => {
    it('should resolve relative and protocol-relative references', () => {
      expect(toAbsoluteUrl('img/a.png', 'https://acme.com/about/')).toBe('https://acme.com/about/img/a.png');
      expect(toAbsoluteUrl('//cdn.acme.com/a.png', 'http://acme.com')).toBe('https://cdn.acme.com/a.png');
    });

    it('should return undefined for blank or unresolvable references', () => {
      expect(toAbsoluteUrl('  ', 'https://acme.com')).toBeUndefined();
      expect(toAbsoluteUrl('/a.png', 'not a url')).toBeUndefined();
    });
  });

  describe('isAbsoluteHttpUrl', () => {
    it('should accept only http and https URLs', () => {
      expect(isAbsoluteHttpUrl('https://acme.com/contact')).toBe(true);
      expect(isAbsoluteHttpUrl('mailto:info@acme.com')).toBe(false);
      expect(isAbsoluteHttpUrl('/contact')).toBe(false);
    });
  });
});
