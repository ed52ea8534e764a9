import { MetadataStorage } from "./metadata-storage";

declare global {
  // eslint-disable-next-line vars-on-top, no-var
  var JsonApiHooksMetadataStorage: MetadataStorage | undefined;
}

export function getMetadataStorage(): MetadataStorage {
  let storage = globalThis.JsonApiHooksMetadataStorage;
  if (!storage) {
    storage = new MetadataStorage();
    globalThis.JsonApiHooksMetadataStorage = storage;
  }

  return storage;
}
