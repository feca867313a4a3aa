// The package entry point runs a self-test when loaded without a parent
// module, so the library file is imported directly.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdf = require("pdf-parse");
  export = pdf;
}
