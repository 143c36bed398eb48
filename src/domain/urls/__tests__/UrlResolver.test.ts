// src/domain/urls/__tests__/UrlResolver.test.ts
import {
  classifyReference,
  hostnameOf,
  isPassthrough,
  locationOf,
  prepareUrl,
  resolveReference,
  unquotePlus,
} from '../UrlResolver';

describe('UrlResolver', () => {
  const location = { origin: 'https://lms.example.org', serverPath: '/courses/c' };

  describe('prepareUrl', () => {
    it('should give protocol-relative references https', () => {
      expect(prepareUrl('//cdn.example.com/x.js', location)).toBe('https://cdn.example.com/x.js');
    });

    it('should keep absolute URLs', () => {
      expect(prepareUrl(' http://other.example.com/a.png ', location)).toBe('http://other.example.com/a.png');
    });

    it('should resolve host-rooted references against the origin only', () => {
      expect(prepareUrl('/static/a.png', location)).toBe('https://lms.example.org/static/a.png');
    });

    it('should resolve relative references against the server path', () => {
      expect(prepareUrl('img/b.png', location)).toBe('https://lms.example.org/courses/c/img/b.png');
      expect(prepareUrl('../b.png', location)).toBe('https://lms.example.org/courses/b.png');
    });
  });

  describe('isPassthrough', () => {
    it('should recognize references that are never rewritten', () => {
      expect(isPassthrough('#top')).toBe(true);
      expect(isPassthrough('data:image/png;base64,AAAA')).toBe(true);
      expect(isPassthrough('mailto:staff@example.org')).toBe(true);
      expect(isPassthrough('  ')).toBe(true);
    });

    it('should let ordinary references through', () => {
      expect(isPassthrough('/static/a.png')).toBe(false);
      expect(isPassthrough('https://example.org/a.png')).toBe(false);
    });
  });

  describe('classifyReference', () => {
    it('should tell the archived host from other hosts', () => {
      expect(classifyReference('https://other.example.com/x', 'lms.example.org')).toBe('external');
      expect(classifyReference('https://lms.example.org/x', 'https://lms.example.org')).toBe('internal');
      expect(classifyReference('img/x.png', 'lms.example.org')).toBe('internal');
      expect(classifyReference('#anchor', 'lms.example.org')).toBe('passthrough');
    });

    it('should leave passthrough references unresolved', () => {
      expect(resolveReference('#a', location, 'lms.example.org')).toEqual({ url: '#a', kind: 'passthrough' });
      expect(resolveReference('x.png', location, 'lms.example.org')).toEqual({
        url: 'https://lms.example.org/courses/c/x.png',
        kind: 'internal',
      });
    });

    it('should resolve references from other hosts as external', () => {
      expect(resolveReference('//cdn.example.com/x.js', location, 'lms.example.org')).toEqual({
        url: 'https://cdn.example.com/x.js',
        kind: 'external',
      });
    });

    it('should give null for references that cannot be made absolute', () => {
      expect(resolveReference('/a', { origin: 'not an origin', serverPath: '' }, 'lms.example.org')).toBeNull();
    });
  });

  describe('locationOf', () => {
    it('should use the directory of a file', () => {
      expect(locationOf('https://lms.example.org/static/css/main.css?v=2')).toEqual({
        origin: 'https://lms.example.org',
        serverPath: '/static/css',
      });
    });

    it('should use the whole path of a directory-like URL', () => {
      expect(locationOf('https://lms.example.org/courses/c/')).toEqual({
        origin: 'https://lms.example.org',
        serverPath: '/courses/c',
      });
    });
  });

  it('should extract hostnames from origins and host strings', () => {
    expect(hostnameOf('https://lms.example.org:8443')).toBe('lms.example.org');
    expect(hostnameOf('lms.example.org:80/path')).toBe('lms.example.org');
  });

  it('should undo plus-encoding', () => {
    expect(unquotePlus('course-v1%3AOrg%2BX%2B1')).toBe('course-v1:Org+X+1');
    expect(unquotePlus('a+b')).toBe('a b');
    expect(unquotePlus('100%+sure')).toBe('100% sure');
  });
});
