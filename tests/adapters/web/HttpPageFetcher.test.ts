import {
  cleanContent,
  extractMainText,
  extractMetadata,
  extractTitle,
  HttpPageFetcher,
} from '../../../src/adapters/web/HttpPageFetcher';
import { pickUserAgent, USER_AGENTS } from '../../../src/adapters/web/userAgents';

const ARTICLE_PAGE = [
  '<html><head><title>Otters &amp; Friends</title><meta name="author" content="Sam Lee"></head>',
  '<body><nav>Home | About</nav>',
  '<article><p>Sea otters use tools to open shellfish and they often float on their backs while eating.</p>',
  '<p>They also hold hands while sleeping so they do not drift apart.</p></article>',
  '<time>2024-05-01</time><footer>All rights reserved</footer></body></html>',
].join('');

describe('HttpPageFetcher', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('summarizes a page with title, text and metadata', async () => {
    fetchSpy.mockResolvedValue(new Response(ARTICLE_PAGE, { status: 200 }));
    const fetcher = new HttpPageFetcher({ random: () => 0 });

    const page = await fetcher.fetchPage('https://example.com/otters');

    expect(page).toEqual({
      status: 'success',
      url: 'https://example.com/otters',
      title: 'Otters & Friends',
      content:
        'Sea otters use tools to open shellfish and they often float on their backs while eating.\n' +
        'They also hold hands while sleeping so they do not drift apart.',
      metadata: { publication_date: '2024-05-01', author: 'Sam Lee' },
    });
    expect(fetchSpy).toHaveBeenCalledWith(
      'https://example.com/otters',
      expect.objectContaining({ headers: expect.objectContaining({ 'User-Agent': USER_AGENTS[0] }) })
    );
  });

  test('truncates content to maxChars', async () => {
    fetchSpy.mockResolvedValue(new Response(ARTICLE_PAGE, { status: 200 }));
    const page = await new HttpPageFetcher({ maxChars: 10 }).fetchPage('https://example.com/otters');
    expect(page.content).toBe('Sea otters');
  });

  test('an empty page gets a placeholder text', async () => {
    fetchSpy.mockResolvedValue(new Response('<html><body></body></html>', { status: 200 }));
    const page = await new HttpPageFetcher().fetchPage('https://example.com/empty');
    expect(page.title).toBe('No title found');
    expect(page.content).toBe('Failed to extract content from page.');
  });

  test('non-ok responses throw', async () => {
    fetchSpy.mockResolvedValue(new Response('nope', { status: 404 }));
    await expect(new HttpPageFetcher().fetchPage('https://example.com/x')).rejects.toThrow(
      'HTTP error 404 while fetching https://example.com/x'
    );
  });
});

describe('page extraction helpers', () => {
  test('falls back to long paragraphs when there is no main or article', () => {
    const html = '<body><p>short</p><p>This paragraph is long enough to count as real content here.</p></body>';
    expect(extractMainText(html)).toBe('This paragraph is long enough to count as real content here.');
  });

  test('falls back to the body text last', () => {
    expect(extractMainText('<body><div>Just a div</div></body>')).toBe('Just a div');
  });

  test('cleanContent drops boilerplate and collapses whitespace', () => {
    expect(cleanContent('Accept cookies to continue\n  Real   text \n\nPrivacy Policy')).toBe('Real text');
  });

  test('metadata is optional', () => {
    expect(extractMetadata('<p>nothing</p>')).toEqual({});
    expect(extractTitle('<title>  </title>')).toBe('No title found');
  });

  test('pickUserAgent stays in range', () => {
    expect(pickUserAgent(() => 0.999999)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
    expect(pickUserAgent(() => 1)).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
  });
});
