export {
	assertColumnNames,
	assertNamesDerivedFromDefaults,
	findImpureNames,
} from "./assertions.js";
export {
	getTestModel,
	silentLogger,
	type TestModel,
	type TestModelOptions,
} from "./get-test-model.js";
