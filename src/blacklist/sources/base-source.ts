export interface InternalSourceDescriptor {
  kind: 'internal';
  databaseRef?: string;   // Named link graph; the local one when omitted
  pageTitle: string;
}

export interface RemoteSourceDescriptor {
  kind: 'remote';
  url: string;
}

export type BlacklistSourceDescriptor = InternalSourceDescriptor | RemoteSourceDescriptor;

export interface BlacklistSource {
  /**
   * Returns the file keys this source disallows.
   * Sources that cannot be reached contribute an empty list.
   */
  fetchEntries(): Promise<string[]>;
}
