export { assert, describe, test } from "./nodeTest.js";
export { createRecorder, settle, type Recorder } from "./async.js";
