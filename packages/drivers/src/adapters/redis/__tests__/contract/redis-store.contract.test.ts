import { DocumentBackend } from "../../../../core/document/document-backend"
import { describeStorageBackendContract } from "../../../../ports/__tests__/storage-backend.contract"
import { FakeRedisClient } from "../../../../tests/fake-redis-client"
import { RedisStore } from "../../redis-store"

describeStorageBackendContract(
  "RedisStore",
  () =>
    new DocumentBackend({
      store: new RedisStore({ client: new FakeRedisClient() }, { keyspacePrefix: "test:" }),
    }),
)
