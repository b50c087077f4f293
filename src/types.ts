/** What a {@link ResourceEvent} reports. */
export type ResourceEventKind = 'load' | 'cache-hit' | 'cache-store' | 'retrieve';

/** Event emitted by the loader; nothing is written to the console. */
export type ResourceEvent = {
  kind: ResourceEventKind;
  /** Normalized resource URL. */
  url: string;
  format?: string;
  /** Destination file, for `retrieve`. */
  filename?: string;
};

/** Event hook accepted by the loader. */
export type ResourceEventOptions = {
  onEvent?: (event: ResourceEvent) => void;
};
