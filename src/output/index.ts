export { MarkdownGenerator, type MarkdownOptions } from './markdown.js';
export { JsonGenerator, OUTPUT_VERSION, type JsonOutputOptions, type JsonOutput, type JsonResult } from './json.js';
