import * as fs from 'fs';
import * as path from 'path';

/**
 * Domain Purity Test
 *
 * src/domain/ holds only pure computation and types. Nothing in it may reach
 * for the logger, the container, services, providers or the HTTP layer.
 */

const DOMAIN_DIR = path.resolve(__dirname, '..');
const FORBIDDEN_PATTERNS = [
  /from\s+['"].*logger/,
  /from\s+['"].*container/,
  /from\s+['"].*services?['"/]/,
  /from\s+['"].*modules\//,
  /from\s+['"].*integrations/,
  /from\s+['"].*middleware/,
  /from\s+['"](express|axios|fs|http)['"]/,
  /import\s+['"].*logger/,
  /import\s+['"].*container/,
  /import\s+['"].*integrations/,
  /process\.env/,
];

function getAllTsFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '__tests__' || entry.name === 'node_modules') continue;
      files.push(...getAllTsFiles(fullPath));
    } else if (entry.name.endsWith('.ts') && !entry.name.endsWith('.test.ts')) {
      files.push(fullPath);
    }
  }

  return files;
}

describe('Domain purity', () => {
  it('finds the projection engine sources', () => {
    const relative = getAllTsFiles(DOMAIN_DIR).map((file) => path.relative(DOMAIN_DIR, file));
    expect(relative).toContain(path.join('projection', 'usage.ts'));
    expect(relative).toContain(path.join('projection', 'starters.ts'));
  });

  it('should not contain impure imports in src/domain/', () => {
    const violations: string[] = [];

    for (const filePath of getAllTsFiles(DOMAIN_DIR)) {
      const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
      const relativePath = path.relative(DOMAIN_DIR, filePath);

      lines.forEach((line, i) => {
        if (FORBIDDEN_PATTERNS.some((pattern) => pattern.test(line))) {
          violations.push(`${relativePath}:${i + 1}: ${line.trim()}`);
        }
      });
    }

    expect(violations).toEqual([]);
  });
});
