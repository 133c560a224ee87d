import { defineConfig } from 'vite';

// JSX is compiled by esbuild using the "jsx" setting from tsconfig.json
export default defineConfig({
  server: {
    port: 3000,
    host: '0.0.0.0',
  },
});
