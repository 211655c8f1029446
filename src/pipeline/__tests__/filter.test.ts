import { makeNewsItem } from '../../__tests__/factories';
import { filterByWindow, isWithinWindow } from '../filter';

const window = { fromDate: '2024-01-01', toDate: '2024-01-07' };

describe('filterByWindow', () => {
  it('should exclude an item from the day before the window', () => {
    const item = makeNewsItem({ publishedAt: new Date('2023-12-31T12:00:00Z') });
    expect(isWithinWindow(item, window)).toBe(false);
  });

  it('should include items on both boundary days', () => {
    const first = makeNewsItem({ publishedAt: new Date('2024-01-01T00:00:00Z') });
    const last = makeNewsItem({ publishedAt: new Date('2024-01-07T23:59:00Z') });
    expect(isWithinWindow(first, window)).toBe(true);
    expect(isWithinWindow(last, window)).toBe(true);
  });

  it('should exclude an item from the day after the window', () => {
    const item = makeNewsItem({ publishedAt: new Date('2024-01-08T00:00:00Z') });
    expect(isWithinWindow(item, window)).toBe(false);
  });

  it('should keep items without a timestamp', () => {
    const undated = makeNewsItem({ publishedAt: undefined });
    const invalid = makeNewsItem({ publishedAt: new Date('not a date') });
    expect(filterByWindow([undated, invalid], window)).toEqual([undated, invalid]);
  });

  it('should drop undated items when the profile requires a timestamp', () => {
    const undated = makeNewsItem({ url: 'https://a.example.com' });
    const dated = makeNewsItem({ url: 'https://b.example.com', publishedAt: new Date('2024-01-03T08:00:00Z') });
    expect(filterByWindow([undated, dated], { ...window, requireTimestamp: true })).toEqual([dated]);
  });

  it('should preserve input order', () => {
    const items = ['c', 'a', 'b'].map((slug) =>
      makeNewsItem({ url: `https://news.example.com/${slug}`, publishedAt: new Date('2024-01-02T00:00:00Z') })
    );
    expect(filterByWindow(items, window).map((item) => item.url)).toEqual([
      'https://news.example.com/c',
      'https://news.example.com/a',
      'https://news.example.com/b'
    ]);
  });
});
