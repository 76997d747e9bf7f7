import type { SongbookLanguage } from '../model/index.js'

const INDEX_HEADINGS: Record<SongbookLanguage, string> = {
  fi: 'Hakemisto',
  en: 'Index',
}

export const DEFAULT_LANGUAGE: SongbookLanguage = 'fi'

export function isSongbookLanguage(value: string): value is SongbookLanguage {
  return Object.prototype.hasOwnProperty.call(INDEX_HEADINGS, value)
}

export function indexHeadingFor(language: SongbookLanguage | undefined): string {
  return INDEX_HEADINGS[language ?? DEFAULT_LANGUAGE]
}
