import type { SiteInfo } from './types';

const MOCK_SITES: readonly SiteInfo[] = Object.freeze(([
  { site_id: 'helsinki-hq', name: 'Helsinki Headquarters', region: 'Uusimaa', segment: 'workplace' },
  { site_id: 'espoo-campus', name: 'Espoo Campus Restaurant', region: 'Uusimaa', segment: 'school' },
  { site_id: 'vantaa-logistics', name: 'Vantaa Logistics Canteen', region: 'Uusimaa', segment: 'workplace' },
  { site_id: 'tampere-tech', name: 'Tampere Tech Park Kitchen', region: 'Pirkanmaa', segment: 'workplace' },
  { site_id: 'turku-hospital', name: 'Turku Hospital Cafeteria', region: 'Varsinais-Suomi', segment: 'healthcare' },
] satisfies SiteInfo[]).map(site => Object.freeze(site)));

export function listSites(): SiteInfo[] {
  return MOCK_SITES.map(site => ({ ...site }));
}

export function findSite(siteId: string): SiteInfo | undefined {
  const site = MOCK_SITES.find(s => s.site_id === siteId);
  return site ? { ...site } : undefined;
}
