import { describe, it, expect } from 'vitest';
import { Task, normalizeDescription } from '../src/task.js';
import { TaskStatus } from '../src/types/task-status.js';
import { UNASSIGNED_TASK_ID } from '../src/types/task.js';
import { InvalidTaskIdError, TaskValidationError } from '../src/errors.js';

const CREATED = new Date('2026-03-01T09:30:00.000Z');
const LATER = new Date('2026-03-02T18:00:00.000Z');

function validationKind(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof TaskValidationError) return err.kind;
    throw err;
  }
  return null;
}

describe('Task.create', () => {
  it('creates a pending, unassigned task', () => {
    const task = Task.create('Buy milk', undefined, CREATED);
    expect(task.id).toBe(UNASSIGNED_TASK_ID);
    expect(task.isAssigned).toBe(false);
    expect(task.title).toBe('Buy milk');
    expect(task.description).toBeNull();
    expect(task.status).toBe(TaskStatus.Pending);
    expect(task.createdAt).toEqual(CREATED);
    expect(task.completedAt).toBeNull();
  });

  it('trims title and description', () => {
    const task = Task.create('  Buy milk  ', '\t2 litres \n');
    expect(task.title).toBe('Buy milk');
    expect(task.description).toBe('2 litres');
  });

  it('treats a blank description as absent', () => {
    expect(Task.create('Buy milk', '   ').description).toBeNull();
    expect(Task.create('Buy milk', '').description).toBeNull();
    expect(Task.create('Buy milk', null).description).toBeNull();
  });

  it('rejects an empty or whitespace-only title', () => {
    expect(validationKind(() => Task.create(''))).toBe('empty-title');
    expect(validationKind(() => Task.create('  '))).toBe('empty-title');
  });

  it('accepts a 200-character title and rejects 201', () => {
    expect(Task.create('a'.repeat(200)).title).toHaveLength(200);
    expect(validationKind(() => Task.create('a'.repeat(201)))).toBe('title-too-long');
  });

  it('measures title length after trimming', () => {
    expect(Task.create(`  ${'a'.repeat(200)}  `).title).toHaveLength(200);
  });

  it('accepts a 1000-character description and rejects 1001', () => {
    expect(Task.create('t', 'd'.repeat(1000)).description).toHaveLength(1000);
    expect(validationKind(() => Task.create('t', 'd'.repeat(1001)))).toBe('description-too-long');
  });

  it('counts emoji as one character each in the title', () => {
    expect(Task.create('😀'.repeat(200)).title).toBe('😀'.repeat(200));
    expect(validationKind(() => Task.create('😀'.repeat(201)))).toBe('title-too-long');
  });

  it('counts emoji as one character each in the description', () => {
    expect(Task.create('t', '🎉'.repeat(1000)).description).toBe('🎉'.repeat(1000));
    expect(validationKind(() => Task.create('t', '🎉'.repeat(1001)))).toBe('description-too-long');
  });

  it('uses readable validation messages', () => {
    expect(() => Task.create(' ')).toThrow('Title cannot be empty');
    expect(() => Task.create('a'.repeat(201))).toThrow('Title cannot exceed 200 characters');
    expect(() => Task.create('t', 'd'.repeat(1001))).toThrow('Description cannot exceed 1000 characters');
  });
});

describe('normalizeDescription', () => {
  it('passes through undefined as null', () => {
    expect(normalizeDescription(undefined)).toBeNull();
  });
});

describe('markComplete', () => {
  it('sets status and completion time', () => {
    const done = Task.create('Buy milk', undefined, CREATED).markComplete(LATER);
    expect(done.status).toBe(TaskStatus.Completed);
    expect(done.isCompleted).toBe(true);
    expect(done.completedAt).toEqual(LATER);
  });

  it('leaves the original task untouched', () => {
    const task = Task.create('Buy milk', undefined, CREATED);
    task.markComplete(LATER);
    expect(task.status).toBe(TaskStatus.Pending);
    expect(task.completedAt).toBeNull();
  });

  it('never records completion before creation', () => {
    const done = Task.create('Buy milk', undefined, LATER).markComplete(CREATED);
    expect(done.completedAt).toEqual(LATER);
  });

  it('is a no-op on an already completed task', () => {
    const done = Task.create('Buy milk', undefined, CREATED).markComplete(LATER);
    const again = done.markComplete(new Date('2026-04-01T00:00:00.000Z'));
    expect(again).toBe(done);
    expect(again.completedAt).toEqual(LATER);
  });
});

describe('withChanges', () => {
  const base = Task.create('Buy milk', 'Semi-skimmed', CREATED).withId(4);

  it('changes only the supplied title', () => {
    const edited = base.withChanges({ title: '  Buy oat milk ' });
    expect(edited.title).toBe('Buy oat milk');
    expect(edited.description).toBe('Semi-skimmed');
    expect(edited.id).toBe(4);
    expect(edited.createdAt).toEqual(CREATED);
  });

  it('changes only the supplied description', () => {
    const edited = base.withChanges({ description: 'Whole' });
    expect(edited.title).toBe('Buy milk');
    expect(edited.description).toBe('Whole');
  });

  it('clears the description with a blank string or null', () => {
    expect(base.withChanges({ description: '  ' }).description).toBeNull();
    expect(base.withChanges({ description: null }).description).toBeNull();
  });

  it('re-validates edited fields', () => {
    expect(validationKind(() => base.withChanges({ title: ' ' }))).toBe('empty-title');
    expect(validationKind(() => base.withChanges({ description: 'x'.repeat(1001) }))).toBe('description-too-long');
  });

  it('keeps completion state', () => {
    const done = base.markComplete(LATER).withChanges({ title: 'Bought milk' });
    expect(done.status).toBe(TaskStatus.Completed);
    expect(done.completedAt).toEqual(LATER);
  });
});

describe('withId', () => {
  it('rejects non-positive ids', () => {
    const task = Task.create('Buy milk');
    expect(() => task.withId(0)).toThrow(InvalidTaskIdError);
    expect(() => task.withId(-3)).toThrow(InvalidTaskIdError);
    expect(() => task.withId(1.5)).toThrow(InvalidTaskIdError);
  });
});

describe('immutability', () => {
  it('freezes instances', () => {
    const task = Task.create('Buy milk');
    expect(Object.isFrozen(task)).toBe(true);
    expect(Reflect.set(task, 'title', 'Something else')).toBe(false);
    expect(task.title).toBe('Buy milk');
  });

  it('hands out fresh Date objects', () => {
    const task = Task.create('Buy milk', undefined, CREATED);
    task.createdAt.setTime(0);
    expect(task.createdAt).toEqual(CREATED);
  });
});

describe('toRecord', () => {
  it('renders every key with explicit nulls', () => {
    const task = Task.create('Buy milk', undefined, CREATED).withId(1);
    expect(task.toRecord()).toEqual({
      id: 1,
      title: 'Buy milk',
      description: null,
      status: 'pending',
      created_at: '2026-03-01T09:30:00.000Z',
      completed_at: null,
    });
  });

  it('renders completion as ISO-8601', () => {
    const task = Task.create('Buy milk', 'Semi-skimmed', CREATED).withId(2).markComplete(LATER);
    expect(task.toRecord()).toEqual({
      id: 2,
      title: 'Buy milk',
      description: 'Semi-skimmed',
      status: 'completed',
      created_at: '2026-03-01T09:30:00.000Z',
      completed_at: '2026-03-02T18:00:00.000Z',
    });
  });

  it('is what JSON.stringify emits', () => {
    const task = Task.create('Buy milk', undefined, CREATED).withId(1);
    expect(JSON.parse(JSON.stringify(task))).toEqual(task.toRecord());
  });
});
