import { defineConfig } from "./src/schema/types.js";

export default defineConfig({
  schema: "./schema",
  output: {
    dir: "./wiki",
    separator: ";",
    displayStubs: true,
  },
});
