import { describeStorageContract } from "../../../ports/__tests__/storage.contract"
import { exclusive } from "../exclusive-storage"

describeStorageContract({ name: "ExclusiveStorage", strategy: exclusive, refcounted: false })
