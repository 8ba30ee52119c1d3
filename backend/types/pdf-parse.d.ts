// The package entry point runs a self-test when loaded as ESM, so the parser
// is imported from its lib file, which @types/pdf-parse does not cover.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdf from 'pdf-parse'
  export default pdf
}
