import { defineConfig } from 'tsup';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';

interface PackageManifest {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

const packageJson: PackageManifest = JSON.parse(
  readFileSync(join(process.cwd(), 'package.json'), 'utf-8'),
);

// Every declared dependency stays external, devDependencies included
const allExternals = [
  ...new Set([
    ...Object.keys(packageJson.dependencies ?? {}),
    ...Object.keys(packageJson.peerDependencies ?? {}),
    ...Object.keys(packageJson.devDependencies ?? {}),
  ]),
].sort();

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    // The shebang in the entry is kept and the output made executable
    cli: 'src/cli/index.ts',
  },
  outDir: 'dist',
  format: ['esm'],
  target: 'node20',
  dts: { entry: { index: 'src/index.ts' } },
  splitting: false,
  sourcemap: true,
  clean: true,
  external: allExternals,
});
