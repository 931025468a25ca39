import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ CAPACITY: "10" }),
  expectedValue: () => ({ CAPACITY: "10" }),
})
