import { defineConfig } from 'vitest/config';
// Imported by path: the workspace package exposes TypeScript sources, which
// Vite would otherwise externalize and hand to Node unbuilt.
import { sharedVitestConfig } from '../vitest-config/src/index.js';

export default defineConfig(sharedVitestConfig);
