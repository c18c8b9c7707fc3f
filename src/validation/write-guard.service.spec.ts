import { WriteGuardService, MINIMUM_FILM_BUDGET } from './write-guard.service';
import { ValidationException } from '../common/exceptions/validation.exception';

describe('WriteGuardService', () => {
  let guard: WriteGuardService;
  const now = new Date(2024, 5, 1);

  beforeEach(() => {
    guard = new WriteGuardService();
  });

  function ruleOf(action: () => void): string | undefined {
    try {
      action();
    } catch (error) {
      if (error instanceof ValidationException) {
        return error.rule;
      }
      throw error;
    }
    return undefined;
  }

  describe('assertActorInsert', () => {
    it('should accept an actor turning 18 this calendar year', () => {
      expect(() => guard.assertActorInsert({ dob: '2006-12-31' }, now)).not.toThrow();
    });

    it('should reject an actor born 17 calendar years ago', () => {
      expect(() => guard.assertActorInsert({ dob: '2007-01-01' }, now)).toThrow(
        'Actor must be at least 18 years old',
      );
      expect(ruleOf(() => guard.assertActorInsert({ dob: '2007-01-01' }, now))).toBe('actor.min_age');
    });
  });

  describe('film budget', () => {
    it('should accept the minimum budget exactly', () => {
      expect(() => guard.assertFilmInsert({ budget: MINIMUM_FILM_BUDGET })).not.toThrow();
    });

    it('should reject a budget below the minimum on insert', () => {
      expect(() => guard.assertFilmInsert({ budget: 99999.99 })).toThrow('Minimum film budget is $100,000');
    });

    it('should reject an update whose merged budget is below the minimum', () => {
      expect(ruleOf(() => guard.assertFilmUpdate({ film_id: 7 }, { budget: 50000 }))).toBe('film.min_budget');
    });

    it('should reject a rating outside 0 to 10', () => {
      expect(ruleOf(() => guard.assertFilmInsert({ budget: 200000, rating: 10.5 }))).toBe('film.rating');
      expect(() => guard.assertFilmInsert({ budget: 200000, rating: null })).not.toThrow();
    });

    it('should reject a non-positive duration', () => {
      expect(ruleOf(() => guard.assertFilmInsert({ budget: 200000, duration: 0 }))).toBe('film.duration');
    });
  });

  describe('non-negative amounts', () => {
    it('should reject negative equipment cost', () => {
      expect(() => guard.assertEquipmentInsert({ cost: -1 })).toThrow('Equipment cost cannot be negative');
      expect(() => guard.assertEquipmentInsert({ cost: 0 })).not.toThrow();
    });

    it('should reject negative location cost per day', () => {
      expect(() => guard.assertLocationInsert({ cost_per_day: -0.01 })).toThrow(
        'Location cost per day cannot be negative',
      );
    });

    it('should reject negative crew experience', () => {
      expect(() => guard.assertCrewInsert({ experience_years: -1 })).toThrow('Experience years cannot be negative');
    });

    it('should reject negative crew experience on update', () => {
      expect(ruleOf(() => guard.assertCrewUpdate({ crew_id: 4, experience_years: -7 }))).toBe('crew.experience');
      expect(() => guard.assertCrewUpdate({ crew_id: 4, experience_years: 0 })).not.toThrow();
    });

    it('should reject negative role salary', () => {
      expect(() => guard.assertRoleInsert({ salary: -100 })).toThrow('Role salary cannot be negative');
      expect(() => guard.assertRoleInsert({ salary: 0 })).not.toThrow();
    });
  });

  describe('assertShotAtInsert', () => {
    it('should accept a single-day booking', () => {
      expect(() =>
        guard.assertShotAtInsert({ shooting_start: '2024-03-01', shooting_end: '2024-03-01' }),
      ).not.toThrow();
    });

    it('should reject an end date before the start date', () => {
      expect(() =>
        guard.assertShotAtInsert({ shooting_start: '2024-03-05', shooting_end: '2024-03-01' }),
      ).toThrow('Shooting end date cannot be before start date');
    });

    it('should reject dates that are not calendar days', () => {
      expect(() =>
        guard.assertShotAtInsert({ shooting_start: 'soon', shooting_end: '2024-03-01' }),
      ).toThrow('Shooting dates must be valid calendar dates');
      expect(ruleOf(() => guard.assertShotAtInsert({ shooting_start: '2024-03-01', shooting_end: '2024-02-30' }))).toBe(
        'shot_at.dates',
      );
    });
  });

  it('should reject a crew member supervising themselves', () => {
    expect(ruleOf(() => guard.assertCrewUpdate({ crew_id: 4, supervisor_id: 4, experience_years: 2 }))).toBe(
      'crew.self_supervision',
    );
    expect(() => guard.assertCrewUpdate({ crew_id: 4, supervisor_id: 5, experience_years: 2 })).not.toThrow();
  });

  it('should reject a market share above 100', () => {
    expect(ruleOf(() => guard.assertDistributorWrite({ market_share: 100.5 }))).toBe('distributor.market_share');
    expect(() => guard.assertDistributorWrite({ market_share: 100 })).not.toThrow();
  });

  it('should carry the entity and offending value in the exception context', () => {
    let caught: unknown;
    try {
      guard.assertEquipmentInsert({ cost: -5, name: 'Dolly' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationException);
    if (caught instanceof ValidationException) {
      expect(caught.getStatus()).toBe(400);
      expect(caught.errorCode).toBe('VALIDATION_ERROR');
      expect(caught.context).toEqual({ rule: 'equipment.cost', entity: 'Equipment', cost: -5 });
    }
  });
});
