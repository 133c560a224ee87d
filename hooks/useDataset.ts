import { useCallback, useEffect, useRef, useState } from 'react';
import { Dataset } from '../types';
import { loadDataset } from '../services/datasetLoader';
import { errorMessage } from '../services/errorUtils';

interface DatasetState {
  dataset: Dataset | null;
  loading: boolean;
  error: string | null;
}

/**
 * Load the dataset behind `url` (null = nothing to load).
 * A response for an older url is dropped once a newer one has been asked for.
 * `setLocal` swaps in a dataset that did not come from a url (file upload).
 */
export function useDataset(url: string | null) {
  const [state, setState] = useState<DatasetState>({ dataset: null, loading: false, error: null });
  const requestRef = useRef(0);

  useEffect(() => {
    if (url === null) return;
    const requestId = ++requestRef.current;
    setState(prev => ({ ...prev, loading: true, error: null }));

    loadDataset(url)
      .then(dataset => {
        if (requestRef.current === requestId) setState({ dataset, loading: false, error: null });
      })
      .catch((err: unknown) => {
        console.error(err);
        if (requestRef.current === requestId) setState({ dataset: null, loading: false, error: errorMessage(err) });
      });
  }, [url]);

  const setLocal = useCallback((dataset: Dataset) => {
    requestRef.current++;
    setState({ dataset, loading: false, error: null });
  }, []);

  const setError = useCallback((error: string) => {
    setState(prev => ({ ...prev, loading: false, error }));
  }, []);

  return { ...state, setLocal, setError };
}
