export { parseInfoLine, parseBestMove, parseEngineName } from './parser.js';
