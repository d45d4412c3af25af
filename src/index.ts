export { FUID } from "./core/FUID"
export type { FUIDInitOptions, FUIDCheckOptions } from "./core/FUID"
export { FUIDValue } from "./core/FUIDValue"
export { FUIDGenerator } from "./core/FUIDGenerator"
export { FUIDParser } from "./core/FUIDParser"
export { FUIDValidator } from "./core/FUIDValidator"
export type { ValidateOptions } from "./core/FUIDValidator"
export { UInt128 } from "./core/UInt128"

export { Base62Encoder, BASE62_ALPHABET, MAX_BASE62_LENGTH } from "./encoding/Base62Encoder"
export { UUIDFormatter, UUID_STRING_LENGTH } from "./encoding/UUIDFormatter"

export {
  RandomSourceResolver,
  RANDOM_SOURCE_ENV,
  nodeRandomSource,
  webCryptoRandomSource,
} from "./crypto/RandomSource"
export type { RandomSource, RandomSourceKind, RandomSourceResolution } from "./crypto/RandomSource"

export { FUIDError } from "./errors/FUIDError"
export type { FUIDErrorCode } from "./errors/FUIDError"

export { FUIDMongoAdapter } from "./adapters/mongo/FUIDMongoAdapter"
export type { FUIDDocument } from "./adapters/mongo/FUIDMongoAdapter"
export { FUIDPostgresAdapter } from "./adapters/postgres/FUIDPostgresAdapter"

export type {
  FUIDInput,
  FUIDMetadata,
  UUIDVariant,
  ValidationFailureReason,
  ValidationResult,
} from "./types"
