import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { parse } from 'dotenv';

/**
 * npm workspaces 루트 = "workspaces" 필드가 있는 가장 가까운 package.json
 */
export function findWorkspaceRoot(startDir: string): string | null {
  let current = startDir;
  while (true) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) return current;

    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function hasWorkspaces(packageJsonPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    // 깨진 package.json은 루트 후보에서 제외
    return false;
  }
}

function applyEnvFile(filePath: string, loadedByFile: Set<string>): void {
  if (!existsSync(filePath)) return;
  const raw = readFileSync(filePath, 'utf8');
  const parsed = parse(raw);

  for (const [key, value] of Object.entries(parsed)) {
    // 셸 주입값 우선, 파일 간에는 나중 파일(.env.local, cwd)이 앞 파일을 덮어쓴다.
    if (process.env[key] === undefined || loadedByFile.has(key)) {
      process.env[key] = value;
      loadedByFile.add(key);
    }
  }
}

export function loadWorkspaceEnv(cwd: string = process.cwd()): void {
  const workspaceRoot = findWorkspaceRoot(cwd) ?? cwd;
  const loadedByFile = new Set<string>();

  applyEnvFile(join(workspaceRoot, '.env'), loadedByFile);
  applyEnvFile(join(workspaceRoot, '.env.local'), loadedByFile);

  if (cwd !== workspaceRoot) {
    applyEnvFile(join(cwd, '.env'), loadedByFile);
    applyEnvFile(join(cwd, '.env.local'), loadedByFile);
  }
}

loadWorkspaceEnv();
