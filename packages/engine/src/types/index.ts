export type { UciScore, UciLine, AnalyseOptions } from './uci.js';
