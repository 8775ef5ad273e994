import * as cheerio from 'cheerio';
import { CharacterVoiceActors, MAL_BASE_URL, VoiceActorRef } from '.';

/**
 * URL of the "Characters & Staff" tab linked from an anime page, if any.
 */
export function findCharactersLink(html: string): string | null {
    const $ = cheerio.load(html);
    const href = $('a[href$="/characters"]').first().attr('href');
    return href ? new URL(href, MAL_BASE_URL).toString() : null;
}

/**
 * Character ids with the ids and languages of their voice actors.
 */
export function extractVoiceActors(html: string): CharacterVoiceActors[] {
    const $ = cheerio.load(html);
    const characters: CharacterVoiceActors[] = [];

    $('table.js-anime-character-table').each((_, table) => {
        const charHref = $(table).find('a[href*="/character/"]').first().attr('href') ?? '';
        const characterId = charHref.match(/\/character\/(\d+)/)?.[1] ?? '';

        const voiceActors: VoiceActorRef[] = [];
        $(table).find('tr.js-anime-character-va-lang').each((_, row) => {
            const nameCell = $(row).find('td[align="right"]').first();
            if (!nameCell.length) return;

            const vaHref = nameCell.find('a[href*="/people/"]').first().attr('href') ?? '';
            voiceActors.push({
                voiceActorId: vaHref.match(/\/people\/(\d+)/)?.[1] ?? '',
                language: nameCell.find('div.js-anime-character-language').first().text().trim(),
            });
        });

        characters.push({ characterId, voiceActors });
    });

    return characters;
}
