import path from 'node:path';
import { register } from 'tsconfig-paths';

// Resolves `@/` imports from both src/ (tsx) and dist/src/ (compiled).
register({ baseUrl: path.resolve(__dirname, '..'), paths: { '@/*': ['src/*'] } });
