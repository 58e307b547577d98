import { useCallback, useEffect, useRef, useState } from 'react';
import { isAbortError } from '../api/errors';

export interface UseRemoteDataReturn<T> {
  data: T | null;
  isLoading: boolean;
  error: Error | null;
  /** Load the current key again */
  refetch: () => void;
}

interface RemoteState<K, T> {
  /** Key the rest of the state belongs to */
  key: K | null;
  data: T | null;
  isLoading: boolean;
  error: Error | null;
}

/**
 * Load a value for `key` and replace it whenever the key changes.
 * A null key clears the value without loading. A new key, a refetch or
 * unmounting aborts the request in flight, so a stale response never
 * overwrites a newer one.
 */
export function useRemoteData<K extends string, T>(
  key: K | null,
  load: (key: K, signal: AbortSignal) => Promise<T>
): UseRemoteDataReturn<T> {
  const [state, setState] = useState<RemoteState<K, T>>({
    key,
    data: null,
    isLoading: key !== null,
    error: null,
  });
  const [reloadToken, setReloadToken] = useState(0);
  const loadRef = useRef(load);
  loadRef.current = load;

  useEffect(() => {
    if (key === null) {
      setState({ key, data: null, isLoading: false, error: null });
      return;
    }

    const controller = new AbortController();
    setState({ key, data: null, isLoading: true, error: null });

    void loadRef.current(key, controller.signal).then(
      (data) => {
        if (controller.signal.aborted) return;
        setState({ key, data, isLoading: false, error: null });
      },
      (err: unknown) => {
        if (controller.signal.aborted || isAbortError(err)) return;
        setState({
          key,
          data: null,
          isLoading: false,
          error: err instanceof Error ? err : new Error('Unknown error'),
        });
      }
    );

    return () => {
      controller.abort();
    };
  }, [key, reloadToken]);

  const refetch = useCallback(() => {
    setReloadToken((token) => token + 1);
  }, []);

  // Until the effect catches up with a new key, the held state is another key's
  if (state.key !== key) {
    return { data: null, isLoading: key !== null, error: null, refetch };
  }

  return { data: state.data, isLoading: state.isLoading, error: state.error, refetch };
}
