/**
 * On-disk project fixture: a recipe, its catalog, a requirements file and
 * a small application tree, written into a temp directory.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CatalogInput } from '../../src/schemas/catalog.js';
import type { RecipeInput } from '../../src/schemas/recipe.js';

export const BASE_DIGEST = 'a'.repeat(64);

export const TEST_CATALOG = {
  baseImages: {
    'python:3.8.3-slim-buster': {
      digest: BASE_DIGEST,
      distribution: 'debian',
      release: 'buster',
      sizeBytes: 1000,
      languagePackageRoot: '/usr/local/lib/python3.8/site-packages',
      systemPackages: { libc6: '2.28-10' },
      languagePackages: { pip: '20.1.1' },
      env: { LANG: 'C.UTF-8', PATH: '/usr/local/bin:/usr/bin:/bin' },
    },
  },
  systemPackages: {
    libc6: { version: '2.28-10', sizeBytes: 500 },
    binutils: { version: '2.31.1-16', sizeBytes: 100, depends: ['libc6'] },
    'gdal-bin': { version: '2.4.0+dfsg-1+b1', sizeBytes: 200, depends: ['libgdal20'] },
    libgdal20: { version: '2.4.0+dfsg-1+b1', sizeBytes: 300 },
    locales: { version: '2.28-10', sizeBytes: 50 },
    gettext: { version: '0.19.8.1-9', sizeBytes: 60 },
  },
  languagePackages: {
    Django: {
      versions: { '3.0.7': { requires: ['asgiref~=3.2', 'pytz', 'sqlparse>=0.2.2'], sizeBytes: 300 } },
    },
    asgiref: { versions: { '3.2.10': { sizeBytes: 11 } } },
    pytz: { versions: { '2020.1': { sizeBytes: 20 } } },
    sqlparse: { versions: { '0.3.1': { sizeBytes: 5 } } },
    psycopg2: { versions: { '2.8.5': { sizeBytes: 50 } } },
  },
} satisfies CatalogInput;

export const TEST_REQUIREMENTS = 'Django==3.0.7\npsycopg2==2.8.5\n';

export const TEST_RECIPE: RecipeInput = {
  name: 'geo-app',
  base: 'python:3.8.3-slim-buster',
  catalog: 'catalog.json',
  systemPackages: {
    packages: ['binutils', 'gdal-bin', 'locales', { name: 'gettext', development: true }],
  },
  dependencies: { manifest: 'requirements.txt' },
  source: { root: 'app', workdir: '/code' },
  env: [
    { name: 'PYTHONUNBUFFERED', value: '1' },
    { name: 'DJANGO_SETTINGS_MODULE', value: 'geo.settings' },
  ],
};

export const TEST_SOURCE: Record<string, string> = {
  'manage.py': 'import geo\n',
  'geo/settings.py': 'DEBUG = False\n',
};

export interface ProjectOptions {
  recipe?: Partial<RecipeInput>;
  /** Requirements file content; null leaves the file out */
  requirements?: string | null;
  source?: Record<string, string>;
}

/**
 * Write the fixture project into `dir`.
 *
 * @returns Path of the recipe file
 */
export async function createProject(dir: string, options: ProjectOptions = {}): Promise<string> {
  const recipePath = path.join(dir, 'provision.json');
  await fs.writeFile(recipePath, JSON.stringify({ ...TEST_RECIPE, ...options.recipe }, null, 2));
  await fs.writeFile(path.join(dir, 'catalog.json'), JSON.stringify(TEST_CATALOG, null, 2));

  const requirements = options.requirements === undefined ? TEST_REQUIREMENTS : options.requirements;
  if (requirements !== null) {
    await fs.writeFile(path.join(dir, 'requirements.txt'), requirements);
  }

  for (const [relPath, content] of Object.entries(options.source ?? TEST_SOURCE)) {
    await writeSourceFile(dir, relPath, content);
  }
  return recipePath;
}

/**
 * Write (or overwrite) a file under the project's app/ tree.
 */
export async function writeSourceFile(dir: string, relPath: string, content: string): Promise<void> {
  const filePath = path.join(dir, 'app', relPath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}
