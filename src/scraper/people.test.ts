import fs from 'fs';
import path from 'path';
import { PeopleScraper, extractPeopleIds, extractPersonFromHtml, parseBirthday } from './people';
import logger from '../util/logger';

jest.mock('../util/logger', () => ({
    __esModule: true,
    default: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const PERSON_HTML = fs.readFileSync(path.join(__dirname, '../../tests/fixtures/person-page.html'), 'utf-8');

const html = (body: string, status = 200, statusText = 'OK') => new Response(body, { status, statusText });

function routes(table: Record<string, Array<Response | Error>>) {
    return jest.fn(async (url: string) => {
        const next = table[url]?.shift();
        if (next === undefined) throw new Error(`Unexpected request ${url}`);
        if (next instanceof Error) throw next;
        return next;
    });
}

const listing = (ids: number[]) =>
    ids.map(id => `<a href="https://myanimelist.net/people/${id}/Person_${id}"><img></a><a href="/people/${id}/Person_${id}">Person ${id}</a>`).join('\n');

describe('extractPersonFromHtml', () => {
    const record = extractPersonFromHtml(7001, PERSON_HTML, 1700000000000);
    const data = record._airbyte_data;

    it('should wrap the person in a record envelope', () => {
        expect(record._airbyte_emitted_at).toBe(1700000000000);
        expect(record._airbyte_ab_id).toMatch(/^[0-9a-f-]{36}$/);
        expect(data.peopleId).toBe(7001);
        expect(data.url).toBe('https://myanimelist.net/people/7001/');
    });

    it('should read the name fields', () => {
        expect(data.name).toBe('Voice, Sample');
        expect(data.givenName).toBe('Sample');
        expect(data.familyName).toBe('Voice');
    });

    it('should normalize the birthday and favourites', () => {
        expect(data.birthday).toBe('1980-03-07');
        expect(data.memberFavorites).toBe(12345);
    });

    it('should keep the free-text details', () => {
        expect(data.more).toBe('Hometown: Example City\n\nBlood type: A');
    });

    it('should list voice acting roles, with nulls for missing parts', () => {
        expect(data.voiceActingRoles).toEqual([
            {
                animeTitle: 'Test Anime Alpha',
                animeUrl: 'https://myanimelist.net/anime/52034/Test_Anime_Alpha',
                characterName: 'Person, Hero',
                characterUrl: 'https://myanimelist.net/character/5001/Hero_Person',
                roleType: 'Main',
            },
            { animeTitle: null, animeUrl: null, characterName: null, characterUrl: null, roleType: null },
        ]);
    });

    it('should list staff positions that link to an anime', () => {
        expect(data.animeStaffPositions).toEqual([
            { animeTitle: 'Test Anime Beta', animeUrl: 'https://myanimelist.net/anime/58259/Test_Anime_Beta', position: 'Theme Song Performance' },
            { animeTitle: 'Test Anime Gamma', animeUrl: 'https://myanimelist.net/anime/60001/Test_Anime_Gamma', position: null },
        ]);
    });

    it('should list published manga', () => {
        expect(data.publishedManga).toEqual([
            { mangaTitle: 'Alpha Manga', mangaUrl: 'https://myanimelist.net/manga/1001/Alpha_Manga', role: 'Story' },
        ]);
    });

    it('should fall back to empty values on a bare page', () => {
        const bare = extractPersonFromHtml(2, '<html><body></body></html>')._airbyte_data;

        expect(bare).toMatchObject({
            name: null,
            givenName: '',
            familyName: '',
            birthday: null,
            memberFavorites: null,
            more: '',
            voiceActingRoles: [],
            animeStaffPositions: [],
            publishedManga: [],
        });
    });
});

describe('parseBirthday', () => {
    it.each([
        ['Mar 12, 1975', '1975-03-12'],
        ['Jan  5, 2001', '2001-01-05'],
        ['Dec 31, 1999', '1999-12-31'],
    ])('should convert %p', (value, expected) => {
        expect(parseBirthday(value)).toBe(expected);
    });

    it.each([['Mar 12'], ['1975'], ['Feb 30, 1990'], ['Foo 1, 1990'], ['Unknown']])('should reject %p', value => {
        expect(parseBirthday(value)).toBeNull();
    });
});

describe('extractPeopleIds', () => {
    it('should collect distinct person ids in page order', () => {
        const page = `${listing([7002, 7001])}<a href="/people.php?letter=B">B</a>`;

        expect(extractPeopleIds(page)).toEqual([7002, 7001]);
    });
});

describe('PeopleScraper', () => {
    const baseOptions = { retryDelayMs: 0, retryMaxDelayMs: 0, userAgent: 'test-agent', now: () => 1700000000000 };

    it('should fetch a person page', async () => {
        const fetch = routes({ 'https://myanimelist.net/people/7001/': [html(PERSON_HTML)] });
        const scraper = new PeopleScraper({ ...baseOptions, fetch });

        const result = await scraper.fetch(7001);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.record._airbyte_data.name).toBe('Voice, Sample');
        expect(fetch).toHaveBeenCalledWith('https://myanimelist.net/people/7001/', { headers: { 'User-Agent': 'test-agent' } });
    });

    it('should report a missing person as not_found', async () => {
        const fetch = routes({ 'https://myanimelist.net/people/9/': [html('', 404, 'Not Found')] });
        const scraper = new PeopleScraper({ ...baseOptions, fetch });

        const result = await scraper.fetch(9);

        expect(result).toMatchObject({ ok: false, id: 9, kind: 'not_found', status: 404 });
    });

    it('should page through each letter of the directory until a short page', async () => {
        const fullPage = Array.from({ length: 50 }, (_, i) => i + 1);
        const fetch = routes({
            'https://myanimelist.net/people.php?letter=A&show=0': [html(listing(fullPage))],
            'https://myanimelist.net/people.php?letter=A&show=50': [html(listing([51, 52]))],
            'https://myanimelist.net/people.php?letter=B&show=0': [html(listing([2, 60]))],
        });
        const scraper = new PeopleScraper({ ...baseOptions, fetch });

        const ids = await scraper.listPeopleIds(['A', 'B']);

        expect(ids).toEqual([...fullPage, 51, 52, 60]);
        expect(fetch).toHaveBeenCalledTimes(3);
    });

    it('should skip a letter whose listing cannot be fetched', async () => {
        const fetch = routes({
            'https://myanimelist.net/people.php?letter=A&show=0': [html('', 404, 'Not Found')],
            'https://myanimelist.net/people.php?letter=B&show=0': [html(listing([7]))],
        });
        const scraper = new PeopleScraper({ ...baseOptions, fetch });

        await expect(scraper.listPeopleIds(['A', 'B'])).resolves.toEqual([7]);
        expect(logger.error).toHaveBeenCalledWith(
            'Failed to list people under A: Not found: https://myanimelist.net/people.php?letter=A&show=0'
        );
    });

    it('should stop listing once aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const fetch = routes({});
        const scraper = new PeopleScraper({ ...baseOptions, fetch });

        await expect(scraper.listPeopleIds(['A'], controller.signal)).resolves.toEqual([]);
        expect(fetch).not.toHaveBeenCalled();
    });
});
