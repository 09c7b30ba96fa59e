export { analyzeCommand } from './analyze.ts';
export { overviewCommand } from './overview.ts';
export { schemesCommand } from './schemes.ts';
