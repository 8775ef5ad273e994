import * as cheerio from 'cheerio';
import { AnyNode, Element, hasChildren, isText } from 'domhandler';
import { randomUUID } from 'crypto';
import {
    MAL_BASE_URL,
    PersonRecord,
    PublishedManga,
    StaffPosition,
    VoiceActingRole,
    buildPersonUrl,
} from '.';
import { BaseScraper, ScraperOptions } from './scraper.base';
import { errorMessage } from '../util/errors';
import logger from '../util/logger';

export const PEOPLE_DIRECTORY_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'.split('');

/** Entries on a full people.php listing page. */
export const PEOPLE_PAGE_SIZE = 50;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface PeopleScraperOptions extends ScraperOptions {
    now?: () => number;
}

export interface PeopleDirectory {
    /** Ids of every person listed under the given letters. */
    listPeopleIds(letters?: string[], signal?: AbortSignal): Promise<number[]>;
}

export const buildPeopleListUrl = (letter: string, page: number): string =>
    `${MAL_BASE_URL}/people.php?letter=${encodeURIComponent(letter)}&show=${page * PEOPLE_PAGE_SIZE}`;

/**
 * Scrapes https://myanimelist.net/people/<id>/ into a PersonRecord, and lists
 * person ids from the alphabetical people directory.
 */
export class PeopleScraper extends BaseScraper<PersonRecord> implements PeopleDirectory {
    private readonly now: () => number;

    constructor(options: PeopleScraperOptions = {}) {
        super(options);
        this.now = options.now ?? Date.now;
    }

    protected buildUrl(id: number): string {
        return buildPersonUrl(id);
    }

    protected async extract(id: number, html: string): Promise<PersonRecord> {
        return extractPersonFromHtml(id, html, this.now());
    }

    /**
     * Walks people.php letter by letter, page by page, until a page lists fewer
     * than a full page of people. A letter whose listing cannot be fetched is
     * logged and skipped.
     */
    async listPeopleIds(letters: string[] = PEOPLE_DIRECTORY_LETTERS, signal?: AbortSignal): Promise<number[]> {
        const ids = new Set<number>();

        for (const letter of letters) {
            for (let page = 0; !signal?.aborted; page++) {
                const url = buildPeopleListUrl(letter, page);
                let html: string;
                try {
                    html = await this.fetchPageWithRetry(url, `list people ${letter} page ${page + 1}`, signal);
                } catch (e) {
                    logger.error(`Failed to list people under ${letter}: ${errorMessage(e)}`);
                    break;
                }

                const found = extractPeopleIds(html);
                found.forEach(id => ids.add(id));
                logger.debug(`Found ${found.length} people on ${url}`);

                if (found.length < PEOPLE_PAGE_SIZE) break;
            }
            if (signal?.aborted) break;
        }

        logger.info(`Listed ${ids.size} people from the directory`);
        return [...ids];
    }
}

/**
 * Distinct person ids linked from a directory page, in page order.
 */
export function extractPeopleIds(html: string): number[] {
    const ids = new Set<number>();
    for (const match of html.matchAll(/\/people\/(\d+)\//g)) {
        ids.add(Number(match[1]));
    }
    return [...ids];
}

/**
 * Parse a person page.
 * @param emittedAt - Epoch milliseconds stamped on the record envelope.
 */
export function extractPersonFromHtml(id: number, html: string, emittedAt: number = Date.now()): PersonRecord {
    const $ = cheerio.load(html);
    const nameTag = $('h1.title-name').first();

    return {
        _airbyte_ab_id: randomUUID(),
        _airbyte_emitted_at: emittedAt,
        _airbyte_data: {
            peopleId: id,
            url: buildPersonUrl(id),
            name: nameTag.length ? nameTag.text().trim() : null,
            givenName: labelValue($, 'Given name:') ?? '',
            familyName: labelValue($, 'Family name:') ?? '',
            birthday: parseBirthday(labelValue($, 'Birthday:')),
            memberFavorites: parseFavorites(labelValue($, 'Member Favorites:')),
            more: extractMore($),
            voiceActingRoles: extractVoiceActingRoles($),
            animeStaffPositions: extractStaffPositions($),
            publishedManga: extractPublishedManga($),
        },
    };
}

/**
 * Text right after a `<span class="dark_text">Label:</span>`.
 */
function labelValue($: cheerio.CheerioAPI, label: string): string | null {
    const span = $('span.dark_text').filter((_, el) => $(el).text().trim() === label).get(0);
    const sibling = span?.nextSibling;
    return sibling ? $(sibling).text().trim() : null;
}

/**
 * "Mar 12, 1975" (the day may be space padded) as 1975-03-12.
 */
export function parseBirthday(value: string | null): string | null {
    const match = value?.match(/^([A-Z][a-z]{2}) {1,2}(\d{1,2}), (\d{4})$/);
    if (!match) return null;

    const month = MONTHS.indexOf(match[1]);
    const day = Number(match[2]);
    const year = Number(match[3]);
    const date = new Date(Date.UTC(year, month, day));
    if (month < 0 || date.getUTCMonth() !== month || date.getUTCDate() !== day) return null;

    return `${match[3]}-${String(month + 1).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function parseFavorites(value: string | null): number | null {
    const digits = value?.replace(/,/g, '');
    return digits && /^\d+$/.test(digits) ? Number(digits) : null;
}

function collectText(node: AnyNode, out: string[]): void {
    if (isText(node)) {
        out.push(node.data);
    } else if (hasChildren(node)) {
        node.children.forEach(child => collectText(child, out));
    }
}

function extractMore($: cheerio.CheerioAPI): string {
    // "informantion" is the site's own class name
    const div = $('div.people-informantion-more').get(0);
    if (!div) return '';

    const pieces: string[] = [];
    collectText(div, pieces);
    return pieces.join('\n').trim();
}

function titleLink(cell: cheerio.Cheerio<Element>): { title: string; url: string } | null {
    const link = cell.find('a.js-people-title').first();
    if (!link.length) return null;
    return { title: link.text().trim(), url: (link.attr('href') ?? '').trim() };
}

function smallText(cell: cheerio.Cheerio<Element>): string | null {
    const small = cell.find('small').first();
    return small.length ? small.text().trim() : null;
}

function tableRows($: cheerio.CheerioAPI, selector: string): cheerio.Cheerio<Element>[][] {
    return $(selector).first().find('tr').toArray()
        .map(row => $(row).find('td').toArray().map(cell => $(cell)));
}

function extractVoiceActingRoles($: cheerio.CheerioAPI): VoiceActingRole[] {
    return tableRows($, 'table.js-table-people-character')
        .filter(cells => cells.length >= 3)
        .map(cells => {
            const anime = cells[1].find('a.js-people-title').first();
            const characterDivs = cells[2].find('div.spaceit_pad');
            const character = characterDivs.first().find('a').first();

            return {
                animeTitle: anime.length ? anime.text().trim() : null,
                animeUrl: anime.attr('href')?.trim() ?? null,
                characterName: character.length ? character.text().trim() : null,
                characterUrl: character.attr('href')?.trim() ?? null,
                roleType: characterDivs.length > 1 ? characterDivs.eq(1).text().trim() : null,
            };
        });
}

function extractStaffPositions($: cheerio.CheerioAPI): StaffPosition[] {
    const positions: StaffPosition[] = [];
    for (const cells of tableRows($, 'table.js-table-people-staff')) {
        if (cells.length < 2) continue;
        const anime = titleLink(cells[1]);
        if (anime) {
            positions.push({ animeTitle: anime.title, animeUrl: anime.url, position: smallText(cells[1]) });
        }
    }
    return positions;
}

function extractPublishedManga($: cheerio.CheerioAPI): PublishedManga[] {
    const works: PublishedManga[] = [];
    for (const cells of tableRows($, 'table.js-table-people-manga')) {
        if (cells.length < 2) continue;
        const manga = titleLink(cells[1]);
        if (manga) {
            works.push({ mangaTitle: manga.title, mangaUrl: manga.url, role: smallText(cells[1]) });
        }
    }
    return works;
}
