import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';

export default defineConfig({
  root: fileURLToPath(new URL('./src', import.meta.url)),
  base: './',

  // Development server
  server: {
    port: 4200,
    host: true,
    proxy: {
      '/api': {
        target: 'http://localhost:4010',
        changeOrigin: true,
        secure: false
      }
    }
  },

  build: {
    target: 'es2022',
    sourcemap: true,
    outDir: fileURLToPath(new URL('./dist', import.meta.url)),
    emptyOutDir: true
  },

  preview: {
    port: 4173,
    host: true
  }
});
