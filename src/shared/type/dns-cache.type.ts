/** Persistent address → hostname map. */
export interface DnsCacheStore {
    has(address: string): Promise<boolean>;
    get(address: string): Promise<string | null>;
    set(address: string, hostname: string): Promise<void>;
    close(): Promise<void>;
}

/** Opens a store for a single operation; the caller closes it. */
export type OpenDnsCacheStore = () => Promise<DnsCacheStore>;

/** Reverse lookup of one address; rejects when there is no name. */
export type ReverseLookup = (address: string) => Promise<string>;
