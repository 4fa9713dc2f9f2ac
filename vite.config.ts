import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { fileURLToPath, URL } from 'node:url';

export const alias = {
  '@components': fileURLToPath(new URL('./src/components', import.meta.url)),
  '@hooks': fileURLToPath(new URL('./src/hooks', import.meta.url)),
  '@reducers': fileURLToPath(new URL('./src/reducers', import.meta.url)),
  '@modules': fileURLToPath(new URL('./src/modules', import.meta.url))
};

export default defineConfig({
  plugins: [react()],
  resolve: { alias }
});
