import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main.ts'],
  format: ['esm'],
  dts: false,
  // Bundle the @keeper/* workspace packages so the sample runs from dist on
  // its own. Their third-party imports stay external and are listed under
  // dependencies in package.json.
  noExternal: [/^@keeper\//],
  external: [/^@opentelemetry\//, 'pino', 'pino-pretty', 'zod'],
});
