import { afterEach, describe, expect, it, vi } from 'vitest';

import { SearchDebouncer } from './search-debouncer';

afterEach(() => {
  vi.useRealTimers();
});

describe('SearchDebouncer', () => {
  it('commits once, after the delay, for a burst of input', () => {
    vi.useFakeTimers();
    const debouncer = new SearchDebouncer();
    const listener = vi.fn();
    debouncer.onCommit(listener);

    debouncer.input('h');
    vi.advanceTimersByTime(100);
    debouncer.input('Ha');
    vi.advanceTimersByTime(100);
    debouncer.input(' HAL ');
    vi.advanceTimersByTime(219);
    expect(listener).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('hal');
    expect(debouncer.query).toBe('hal');
  });

  it('skips committing a query equal to the current one', () => {
    vi.useFakeTimers();
    const debouncer = new SearchDebouncer();
    const listener = vi.fn();
    debouncer.onCommit(listener);

    debouncer.input('doom');
    vi.advanceTimersByTime(220);
    debouncer.input('DOOM ');
    vi.advanceTimersByTime(220);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('clears immediately and drops the pending commit', () => {
    vi.useFakeTimers();
    const debouncer = new SearchDebouncer();
    const listener = vi.fn();
    debouncer.onCommit(listener);

    debouncer.input('doom');
    vi.advanceTimersByTime(220);
    debouncer.input('doo');
    debouncer.input('   ');

    expect(listener).toHaveBeenLastCalledWith('');
    expect(debouncer.query).toBe('');
    vi.advanceTimersByTime(1_000);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('does nothing for empty input when nothing is committed', () => {
    vi.useFakeTimers();
    const debouncer = new SearchDebouncer();
    const listener = vi.fn();
    debouncer.onCommit(listener);

    debouncer.input('');
    vi.advanceTimersByTime(1_000);

    expect(listener).not.toHaveBeenCalled();
  });
});
