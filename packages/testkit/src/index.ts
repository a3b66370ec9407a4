export { createRng, type Rng } from "./rng.js";
export { captureWarnings } from "./warnings.js";
export { assert, describe, test } from "./nodeTest.js";
