import type { RSSSource } from '../types';

export const RSS_SOURCES: RSSSource[] = [
  {
    name: 'BBC Mundo',
    url: 'https://www.bbc.com/mundo/index.xml',
    contentField: 'description'
  },
  {
    name: 'Reuters World',
    url: 'https://www.reuters.com/world/rss',
    contentField: 'content:encoded',
    fallbackField: 'description'
  },
  {
    name: 'El País América',
    url: 'https://feeds.elpais.com/mrss-s/pages/ep/site/elpais.com/section/america/portada',
    contentField: 'content:encoded',
    fallbackField: 'description'
  }
];
