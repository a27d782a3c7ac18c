export interface RequestInitWithSignal {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}
