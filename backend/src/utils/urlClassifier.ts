/**
 * Storefront URL classification and identifier extraction.
 *
 * Extraction is purely positional: a URL that contains a platform marker but
 * has an unexpected shape yields whatever sits in the expected position, which
 * may be a wrong or empty identifier.
 */

import type { AppStoreIds, PlayStoreIds, StoreIds } from '@shared/types';
import { UnsupportedUrlError } from './errors.js';

export const APP_STORE_MARKER = 'apps.apple.com';
export const PLAY_STORE_MARKER = 'play.google.com';

function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

/**
 * e.g. https://apps.apple.com/it/app/enel-x-way/id1377291789
 * gives appId "1377291789" and appName "enel-x-way"
 */
export function extractAppStoreIds(url: string): AppStoreIds {
  const segments = url.split('/');
  const lastSegment = segments[segments.length - 1] ?? '';
  const appName = segments[segments.length - 2] ?? '';

  return {
    platform: 'appstore',
    appId: stripPrefix(lastSegment, 'id'),
    appName
  };
}

/**
 * e.g. https://play.google.com/store/apps/details?id=com.enel.mobile.recharge2&hl=it&gl=US
 * gives appId "com.enel.mobile.recharge2". Assumes `id` is the first query parameter.
 */
export function extractPlayStoreId(url: string): PlayStoreIds {
  const lastSegment = url.split('/').pop() ?? '';
  const query = lastSegment.split('?').pop() ?? '';
  const firstParam = query.split('&')[0] ?? '';

  return {
    platform: 'playstore',
    appId: stripPrefix(firstParam, 'id=')
  };
}

export function classifyAndExtract(url: string): StoreIds {
  if (url.includes(APP_STORE_MARKER)) {
    return extractAppStoreIds(url);
  }
  if (url.includes(PLAY_STORE_MARKER)) {
    return extractPlayStoreId(url);
  }
  throw new UnsupportedUrlError(url);
}
