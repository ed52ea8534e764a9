export { getMetadataStorage } from "./getMetadataStorage";
export { MetadataStorage } from "./metadata-storage";
export type {
    AttributeMetadata,
    HasManyThroughOptions,
    RelationshipMetadata,
    RelationshipOptions,
    ResourceMetadata
} from "./definitions/Resource";
