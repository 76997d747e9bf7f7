import { describe, it, expect } from 'vitest'
import { buildCatalog } from '../src/buildCatalog.js'
import type { Workbook } from '../src/model/index.js'

const HEADER = ['artist', 'title', 'source']

const workbook: Workbook = {
  sheets: [
    {
      name: 'Muut',
      rows: [HEADER, ['Queen', 'Bohemian Rhapsody', null], ['ABBA', 'Waterloo', null]],
    },
    { name: 'Empty', rows: [HEADER] },
    {
      name: 'Anime',
      rows: [HEADER, ['TK', 'Unravel', 'Tokyo Ghoul'], [null, 'Blue Bird', 'Naruto']],
    },
  ],
}

describe('buildCatalog', () => {
  it('sequences sections and skips empty ones', () => {
    const catalog = buildCatalog(workbook)
    expect(catalog.sections.map(s => s.name)).toEqual(['Anime', 'Muut'])
    expect(catalog.sections.map(s => s.songCount)).toEqual([2, 2])
  })

  it('groups each section by source', () => {
    const [anime] = buildCatalog(workbook).sections
    expect(anime.groups).toEqual([
      { source: 'Naruto', songs: [{ artist: '', title: 'Blue Bird' }] },
      { source: 'Tokyo Ghoul', songs: [{ artist: 'TK', title: 'Unravel' }] },
    ])
  })

  it('collects index entries in section order, then row order', () => {
    const { index } = buildCatalog(workbook)
    expect(index).toEqual([
      { title: 'Unravel', artist: 'TK', section: 'Anime' },
      { title: 'Blue Bird', artist: '', section: 'Anime' },
      { title: 'Bohemian Rhapsody', artist: 'Queen', section: 'Muut' },
      { title: 'Waterloo', artist: 'ABBA', section: 'Muut' },
    ])
  })

  it('honours a custom section order', () => {
    const catalog = buildCatalog(workbook, { order: ['Muut'] })
    expect(catalog.sections.map(s => s.name)).toEqual(['Muut', 'Anime'])
  })

  it('is empty for a workbook without songs', () => {
    expect(buildCatalog({ sheets: [{ name: 'Empty', rows: [] }] })).toEqual({ sections: [], index: [] })
  })
})
