import { describeStorageContract } from "../../../ports/__tests__/storage.contract"
import { shared } from "../shared-storage"

describeStorageContract({ name: "SharedStorage", strategy: shared, refcounted: true })
