import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { randomUUID } from 'crypto';
import {
    AggregateRating,
    AnimeRecord,
    BreadcrumbItem,
    LeftSide,
    LinkRef,
    MAL_BASE_URL,
    RelatedEntries,
    ThemeSong,
    ThemeSongs,
    buildAnimeUrl,
} from '.';
import { BaseScraper, ScraperOptions } from './scraper.base';
import { extractVoiceActors, findCharactersLink } from './characters';
import { errorMessage } from '../util/errors';
import logger from '../util/logger';

type Section = cheerio.Cheerio<Element>;

const TITLE_SELECTORS = ['h1.title-name strong', 'h1.title-name', "span[itemprop='name']"];

const ALTERNATIVE_TITLE_KEYS = ['Synonyms', 'Japanese', 'English', 'German', 'Spanish', 'French'];

const INFORMATION_KEYS = [
    'Type', 'Episodes', 'Status', 'Aired', 'Premiered', 'Broadcast', 'Producers', 'Licensors',
    'Studios', 'Source', 'Genres', 'Theme', 'Demographic', 'Duration', 'Rating',
];

export interface AnimeScraperOptions extends ScraperOptions {
    /** Also fetch the Characters & Staff page for voice actors. Defaults to true. */
    includeVoiceActors?: boolean;
    now?: () => number;
}

/**
 * Scrapes https://myanimelist.net/anime/<id> into an AnimeRecord.
 */
export class AnimeScraper extends BaseScraper<AnimeRecord> {
    private readonly includeVoiceActors: boolean;
    private readonly now: () => number;

    constructor(options: AnimeScraperOptions = {}) {
        super(options);
        this.includeVoiceActors = options.includeVoiceActors ?? true;
        this.now = options.now ?? Date.now;
    }

    protected buildUrl(id: number): string {
        return buildAnimeUrl(id);
    }

    protected async extract(id: number, html: string, _url: string, signal?: AbortSignal): Promise<AnimeRecord> {
        const record = extractAnimeFromHtml(id, html, this.now());

        if (this.includeVoiceActors) {
            const charactersUrl = findCharactersLink(html);
            if (!charactersUrl) {
                logger.warn(`No Characters & Staff link found for anime ID ${id}`);
            } else {
                try {
                    const charactersHtml = await this.fetchPageWithRetry(charactersUrl, `fetch characters of ${id}`, signal);
                    record._airbyte_data.voiceActors = extractVoiceActors(charactersHtml);
                } catch (e) {
                    logger.error(`Failed to fetch Characters & Staff page ${charactersUrl}: ${errorMessage(e)}`);
                }
            }
        }

        return record;
    }
}

/**
 * Parse an anime page. Voice actors come from a separate page and are left empty here.
 * @param emittedAt - Epoch milliseconds stamped on the record envelope.
 */
export function extractAnimeFromHtml(id: number, html: string, emittedAt: number = Date.now()): AnimeRecord {
    const $ = cheerio.load(html);
    const url = buildAnimeUrl(id);

    const title = extractTitle($);
    const breadcrumbs = extractBreadcrumbs(id);

    return {
        _airbyte_ab_id: randomUUID(),
        _airbyte_emitted_at: emittedAt,
        _airbyte_data: {
            id,
            title,
            url,
            microdata: [
                {
                    _type: 'http://schema.org/TVSeries',
                    name: getText($, 'h1.title-name strong'),
                    image: extractImageUrl($),
                    genre: extractGenres($),
                    aggregateRating: extractRating($),
                    itemListElement: breadcrumbs,
                    description: getText($, 'p[itemprop="description"]'),
                },
                {
                    _type: 'http://schema.org/BreadcrumbList',
                    itemListElement: breadcrumbs,
                },
            ],
            leftSide: extractLeftSide($),
            relatedEntries: extractRelatedEntries($),
            themeSongs: extractThemeSongs($),
            streamingPlatforms: extractStreamingPlatforms($),
            voiceActors: [],
        },
    };
}

function getText($: cheerio.CheerioAPI, selector: string): string {
    return $(selector).first().text().trim();
}

function stripChars(value: string, chars: string): string {
    let start = 0;
    let end = value.length;
    while (start < end && chars.includes(value[start])) start++;
    while (end > start && chars.includes(value[end - 1])) end--;
    return value.slice(start, end);
}

function absoluteUrl(href: string): string {
    try {
        return new URL(href, MAL_BASE_URL).toString();
    } catch {
        return href;
    }
}

function extractTitle($: cheerio.CheerioAPI): string {
    for (const selector of TITLE_SELECTORS) {
        const element = $(selector).first();
        if (element.length) {
            return element.text().trim();
        }
    }
    return 'Unknown';
}

function extractImageUrl($: cheerio.CheerioAPI): string {
    const img = $('img[itemprop="image"]').first();
    return img.attr('data-src') ?? img.attr('src') ?? '';
}

function extractGenres($: cheerio.CheerioAPI): string[] {
    return $('span[itemprop="genre"]').toArray().map(el => $(el).text().trim());
}

function extractRating($: cheerio.CheerioAPI): AggregateRating | null {
    const ratingValue = getText($, 'span[itemprop="ratingValue"]');
    const ratingCount = getText($, 'span[itemprop="ratingCount"]');

    if (!ratingValue || !ratingCount) {
        return null;
    }

    return {
        _type: 'http://schema.org/AggregateRating',
        ratingValue,
        ratingCount,
        bestRating: '10',
        worstRating: '1',
    };
}

function extractBreadcrumbs(id: number): BreadcrumbItem[] {
    return [
        { _type: 'http://schema.org/ListItem', item: `${MAL_BASE_URL}/`, position: '1' },
        { _type: 'http://schema.org/ListItem', item: `${MAL_BASE_URL}/anime.php`, position: '2' },
        { _type: 'http://schema.org/ListItem', item: buildAnimeUrl(id), position: '3' },
    ];
}

// --- Left column ---

function findHeading($: cheerio.CheerioAPI, text: string): Section {
    return $('h2').filter((_, el) => $(el).text().trim() === text).first();
}

/**
 * The `div.spaceit_pad` rows of a sidebar section, up to the next heading.
 */
function sectionRows($: cheerio.CheerioAPI, heading: string): Section[] {
    const header = findHeading($, heading);
    if (!header.length) return [];
    return header.nextUntil('h2').filter('div.spaceit_pad').toArray().map(el => $(el));
}

/**
 * Splits a `<span class="dark_text">Key:</span> value` row.
 */
function labeledRow(row: Section): { key: string; value: string } | null {
    const label = row.find('span.dark_text').first();
    if (!label.length) return null;

    const labelText = label.text();
    return {
        key: labelText.trim().replace(/:+$/, ''),
        value: row.text().replace(labelText, '').trim(),
    };
}

function extractLeftSide($: cheerio.CheerioAPI): LeftSide {
    return {
        'Alternative Titles': extractAlternativeTitles($),
        Information: extractInformation($),
        Statistics: extractStatistics($),
        'Available At': extractAvailableAt($),
        Resources: extractResources($),
    };
}

function extractAlternativeTitles($: cheerio.CheerioAPI): Record<string, string> {
    const titles: Record<string, string> = Object.fromEntries(ALTERNATIVE_TITLE_KEYS.map(key => [key, '']));

    for (const row of sectionRows($, 'Alternative Titles')) {
        const entry = labeledRow(row);
        if (entry && (entry.key === 'Synonyms' || entry.key === 'Japanese')) {
            titles[entry.key] = entry.value;
        }
    }

    // Other languages sit in a collapsed block
    $('div.js-alternative-titles div.spaceit_pad').each((_, el) => {
        const entry = labeledRow($(el));
        if (entry && entry.key in titles) {
            titles[entry.key] = entry.value;
        }
    });

    return titles;
}

function extractInformation($: cheerio.CheerioAPI): Record<string, string> {
    const info: Record<string, string> = Object.fromEntries(INFORMATION_KEYS.map(key => [key, '']));

    for (const row of sectionRows($, 'Information')) {
        const entry = labeledRow(row);
        if (!entry) continue;

        if (entry.key === 'Genres') {
            info.Genres = extractGenres($).join(', ');
        } else if (entry.key in info) {
            info[entry.key] = entry.value;
        }
    }

    return info;
}

function cleanRankedValue(value: string): string | null {
    if (value.includes('N/A')) return 'N/A';
    const match = value.match(/#\d+/);
    return match ? match[0] : null;
}

function extractStatistics($: cheerio.CheerioAPI): Record<string, string> {
    const statistics: Record<string, string> = {};

    for (const row of sectionRows($, 'Statistics')) {
        const entry = labeledRow(row);
        if (!entry) continue;

        if (entry.key === 'Ranked') {
            const rank = cleanRankedValue(entry.value);
            if (rank) statistics.Ranked = rank;
            continue;
        }

        statistics[entry.key] = entry.value.split(/\s+/).filter(Boolean).join(' ');
    }

    return statistics;
}

function extractAvailableAt($: cheerio.CheerioAPI): LinkRef[] {
    const header = findHeading($, 'Available At');
    if (!header.length) return [];

    return header.nextAll('div').first().find('a').toArray().map(el => ({
        url: $(el).attr('href') ?? '',
        title: $(el).text().trim(),
    }));
}

function extractResources($: cheerio.CheerioAPI): LinkRef[] {
    const header = findHeading($, 'Resources');
    if (!header.length) return [];

    const externalLinks = header.nextAll('div.external_links').first();
    if (!externalLinks.length) return [];

    // Visible links first, then the ones behind "More links"
    const links = [
        ...externalLinks.children('a.link').toArray(),
        ...externalLinks.find('div.js-links[data-rel="resource"] a.link').toArray(),
    ];

    const resources: LinkRef[] = [];
    for (const el of links) {
        const caption = $(el).find('div.caption').first();
        if (caption.length) {
            resources.push({ url: $(el).attr('href') ?? '', title: caption.text().trim() });
        }
    }
    return resources;
}

// --- Main column ---

function extractSongs($: cheerio.CheerioAPI, selector: string): ThemeSong[] {
    const songs: ThemeSong[] = [];

    $(selector).first().find('tr').each((_, row) => {
        const title = $(row).find('span.theme-song-title').first();
        if (!title.length) return;

        const artist = $(row).find('span.theme-song-artist').first();
        const episode = $(row).find('span.theme-song-episode').first();

        songs.push({
            title: stripChars(title.text().trim(), '"'),
            artist: artist.length ? artist.text().replaceAll(' by', '').trim() : '',
            episode: episode.length ? stripChars(episode.text().trim(), '()') : '',
        });
    });

    return songs;
}

function extractThemeSongs($: cheerio.CheerioAPI): ThemeSongs {
    return {
        // "opnening" is the site's own class name
        opening: extractSongs($, 'div.theme-songs.js-theme-songs.opnening'),
        ending: extractSongs($, 'div.theme-songs.js-theme-songs.ending'),
    };
}

function extractRelatedEntries($: cheerio.CheerioAPI): RelatedEntries {
    const related: RelatedEntries = { tile: [], table: {} };

    $('div.entries-tile div.entry').each((_, entry) => {
        const relationText = $(entry).find('div.relation').first().text().split(/\s+/).filter(Boolean);
        const link = $(entry).find('div.title a').first();
        if (relationText.length === 0 || !link.length) return;

        const [relationType, relationFormat] = relationText;
        related.tile.push({
            relation: relationFormat ? `${relationType} (${stripChars(relationFormat, '()')})` : relationType,
            title: link.text().trim(),
            url: link.attr('href') ?? '',
        });
    });

    // Tabular relations: "Adaptation:", "Side Story:" ...
    $('table.entries-table tr').each((_, row) => {
        const cells = $(row).find('td');
        const relation = cells.first().text().trim().replace(/:+$/, '');
        if (!relation || cells.length < 2) return;

        related.table[relation] = cells.eq(1).find('a').toArray().map(el => ({
            relation,
            title: $(el).text().trim(),
            url: absoluteUrl($(el).attr('href') ?? ''),
        }));
    });

    return related;
}

function extractStreamingPlatforms($: cheerio.CheerioAPI): LinkRef[] {
    return $('div.broadcasts a.broadcast-item').toArray().map(el => ({
        url: $(el).attr('href') ?? '',
        title: $(el).attr('title') ?? '',
    }));
}
