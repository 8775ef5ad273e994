export const MAL_BASE_URL = 'https://myanimelist.net';

export const buildAnimeUrl = (malId: number): string => `${MAL_BASE_URL}/anime/${malId}`;

export interface LinkRef {
    url: string;
    title: string;
}

export interface ThemeSong {
    title: string;
    artist: string;
    episode: string;
}

export interface ThemeSongs {
    opening: ThemeSong[];
    ending: ThemeSong[];
}

export interface RelatedEntry {
    relation: string;
    title: string;
    url: string;
}

export interface RelatedEntries {
    tile: RelatedEntry[];
    table: Record<string, RelatedEntry[]>;
}

export interface AggregateRating {
    _type: 'http://schema.org/AggregateRating';
    ratingValue: string;
    ratingCount: string;
    bestRating: '10';
    worstRating: '1';
}

export interface BreadcrumbItem {
    _type: 'http://schema.org/ListItem';
    item: string;
    position: string;
}

export interface TVSeriesMicrodata {
    _type: 'http://schema.org/TVSeries';
    name: string;
    image: string;
    genre: string[];
    aggregateRating: AggregateRating | null;
    itemListElement: BreadcrumbItem[];
    description: string;
}

export interface BreadcrumbListMicrodata {
    _type: 'http://schema.org/BreadcrumbList';
    itemListElement: BreadcrumbItem[];
}

export interface LeftSide {
    'Alternative Titles': Record<string, string>;
    Information: Record<string, string>;
    Statistics: Record<string, string>;
    'Available At': LinkRef[];
    Resources: LinkRef[];
}

export interface VoiceActorRef {
    voiceActorId: string;
    language: string;
}

export interface CharacterVoiceActors {
    characterId: string;
    voiceActors: VoiceActorRef[];
}

export interface AnimeDetails {
    id: number;
    title: string;
    url: string;
    microdata: [TVSeriesMicrodata, BreadcrumbListMicrodata];
    leftSide: LeftSide;
    relatedEntries: RelatedEntries;
    themeSongs: ThemeSongs;
    streamingPlatforms: LinkRef[];
    voiceActors: CharacterVoiceActors[];
}

/**
 * Envelope kept compatible with the loader format downstream consumers read.
 */
export interface AnimeRecord {
    _airbyte_ab_id: string;
    _airbyte_emitted_at: number;
    _airbyte_data: AnimeDetails;
}

export const buildPersonUrl = (personId: number): string => `${MAL_BASE_URL}/people/${personId}/`;

export interface VoiceActingRole {
    animeTitle: string | null;
    animeUrl: string | null;
    characterName: string | null;
    characterUrl: string | null;
    roleType: string | null;
}

export interface StaffPosition {
    animeTitle: string;
    animeUrl: string;
    position: string | null;
}

export interface PublishedManga {
    mangaTitle: string;
    mangaUrl: string;
    role: string | null;
}

export interface PersonDetails {
    peopleId: number;
    url: string;
    name: string | null;
    givenName: string;
    familyName: string;
    /** ISO date (YYYY-MM-DD) when the page gives a full date. */
    birthday: string | null;
    memberFavorites: number | null;
    more: string;
    voiceActingRoles: VoiceActingRole[];
    animeStaffPositions: StaffPosition[];
    publishedManga: PublishedManga[];
}

export interface PersonRecord {
    _airbyte_ab_id: string;
    _airbyte_emitted_at: number;
    _airbyte_data: PersonDetails;
}
