import { SerpApiSearch } from '../../../src/adapters/search/SerpApiSearch';

describe('SerpApiSearch', () => {
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('throws when apiKey missing', async () => {
    const search = new SerpApiSearch({});
    await expect(search.search('x')).rejects.toThrow(/SERPAPI_KEY/);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  test('calls SerpAPI and maps organic results', async () => {
    fetchSpy.mockResolvedValue(
      new Response(
        JSON.stringify({
          organic_results: [
            { title: 'A', link: 'https://a.example', snippet: 'aa' },
            { title: 'FTP', link: 'ftp://files.example', snippet: 'skip me' },
            { link: 'https://b.example' },
          ],
        }),
        { status: 200 }
      )
    );

    const search = new SerpApiSearch({ apiKey: 'test-secret' });
    const out = await search.search('hello', 2);

    const url = new URL(String(fetchSpy.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe('https://serpapi.com/search.json');
    expect(url.searchParams.get('q')).toBe('hello');
    expect(url.searchParams.get('num')).toBe('2');
    expect(url.searchParams.get('api_key')).toBe('test-secret');

    expect(out).toEqual([
      { title: 'A', link: 'https://a.example', snippet: 'aa', source: 'Google' },
      { title: 'No title', link: 'https://b.example', snippet: 'No description available', source: 'Google' },
    ]);
  });

  test('a payload without organic results gives no results', async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ error: 'none' }), { status: 200 }));
    await expect(new SerpApiSearch({ apiKey: 'test-secret' }).search('x')).resolves.toEqual([]);
  });

  test('throws on http error', async () => {
    fetchSpy.mockResolvedValue(new Response('bad', { status: 500, statusText: 'Bad' }));
    const search = new SerpApiSearch({ apiKey: 'test-secret' });
    await expect(search.search('x')).rejects.toThrow('SerpAPI error: 500 Bad');
  });
});
