import { AnimeScraper } from './anime';
import { PeopleScraper } from './people';
import Scraper from './scraper.interface';

export type TargetKind = 'anime' | 'people';

export const createScraper = (kind: TargetKind): Scraper<object> =>
    kind === 'people' ? new PeopleScraper() : new AnimeScraper();
