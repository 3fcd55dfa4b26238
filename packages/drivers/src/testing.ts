export {
  describeStorageBackendContract,
  type StorageBackendContractOptions,
} from "./ports/__tests__/storage-backend.contract"
export { FakePgPool } from "./tests/fake-pg-pool"
export { FakeRedisClient } from "./tests/fake-redis-client"
