// The package entry runs a self-test when loaded without a parent module,
// so the library file is imported directly. Same API as the package root.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse = require('pdf-parse');
  export = pdfParse;
}
