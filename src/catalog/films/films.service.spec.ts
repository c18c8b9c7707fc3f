import { normalizeGenres } from './films.service';

describe('normalizeGenres', () => {
  it('should trim entries and drop blanks', () => {
    expect(normalizeGenres([' Drama', '', '  ', 'Thriller '])).toEqual(['Drama', 'Thriller']);
  });

  it('should drop case-insensitive duplicates keeping the first spelling', () => {
    expect(normalizeGenres(['Sci-Fi', 'Drama', 'sci-fi', 'DRAMA'])).toEqual(['Sci-Fi', 'Drama']);
  });

  it('should return an empty list for no genres', () => {
    expect(normalizeGenres([])).toEqual([]);
  });
});
