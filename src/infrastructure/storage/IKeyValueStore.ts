// synchronous local key-value storage, modelled on the web storage API
export interface IKeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}
