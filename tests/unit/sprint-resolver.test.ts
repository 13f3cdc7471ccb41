/**
 * Unit tests for sprint name resolution and sprint listing order
 */

import { AzureIteration } from '../../src/client/schemas';
import { SprintNotFoundError } from '../../src/errors/index';
import { resolveSprint, sortSprints, toSprint } from '../../src/handlers/sprint-resolver';
import { Sprint } from '../../src/types/index';
import { captureError } from '../helpers/fake-azure-devops';

const iterations: AzureIteration[] = [
  { id: 'a', name: 'Sprint 36', path: 'TestProject\\Sprint 36', attributes: { timeFrame: 'past' } },
  { id: 'b', name: 'Sprint 37', path: 'TestProject\\Release 1\\Sprint 37', attributes: { timeFrame: 'current' } },
];

function sprint(name: string, timeFrame: string | null): Sprint {
  return { name, path: `TestProject\\${name}`, start_date: null, finish_date: null, time_frame: timeFrame };
}

describe('resolveSprint', () => {
  it('should return the iteration with the exact display name', () => {
    expect(resolveSprint('Sprint 37', iterations).path).toBe('TestProject\\Release 1\\Sprint 37');
  });

  it.each([['sprint 37'], ['SPRINT 37'], ['Sprint 37 '], [' Sprint 37'], ['Sprint']])(
    'should not match %p',
    (name) => {
      const error = captureError(() => resolveSprint(name, iterations));
      expect(error).toBeInstanceOf(SprintNotFoundError);
      expect(error).toMatchObject({ statusCode: 404, reason: 'sprint_not_found', message: `Sprint not found: ${name}` });
    }
  );

  it('should report not found when the team has no iterations', () => {
    expect(() => resolveSprint('Sprint 37', [])).toThrow(SprintNotFoundError);
  });
});

describe('toSprint', () => {
  it('should map iteration attributes to the sprint shape', () => {
    expect(
      toSprint({
        id: 'c',
        name: 'Sprint 38',
        path: 'TestProject\\Sprint 38',
        attributes: { startDate: '2025-01-20T00:00:00Z', finishDate: '2025-01-31T00:00:00Z', timeFrame: 'future' },
      })
    ).toEqual({
      name: 'Sprint 38',
      path: 'TestProject\\Sprint 38',
      start_date: '2025-01-20T00:00:00Z',
      finish_date: '2025-01-31T00:00:00Z',
      time_frame: 'future',
    });
  });

  it('should use null for missing attributes', () => {
    expect(toSprint({ id: 'd', name: 'Backlog', path: 'TestProject' })).toEqual({
      name: 'Backlog',
      path: 'TestProject',
      start_date: null,
      finish_date: null,
      time_frame: null,
    });
  });
});

describe('sortSprints', () => {
  it('should order current, future, past, then unknown, keeping upstream order within a group', () => {
    const sorted = sortSprints([
      sprint('P1', 'past'),
      sprint('U1', null),
      sprint('F1', 'future'),
      sprint('P2', 'past'),
      sprint('C1', 'current'),
      sprint('X1', 'someday'),
      sprint('F2', 'future'),
    ]);

    expect(sorted.map((item) => item.name)).toEqual(['C1', 'F1', 'F2', 'P1', 'P2', 'U1', 'X1']);
  });

  it('should not mutate its input', () => {
    const input = [sprint('P1', 'past'), sprint('C1', 'current')];
    sortSprints(input);
    expect(input.map((item) => item.name)).toEqual(['P1', 'C1']);
  });
});
