import { defineConfig } from 'vite';
import { apiPlugin } from './vite-api-plugin';

export default defineConfig({
  plugins: [apiPlugin()],
  server: {
    port: 3000,
  },
});
