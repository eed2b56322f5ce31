/**
 * Project files shared by command tests.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export const RULES_YAML = `root: src
chain: repository -> service
layers:
  - name: domain
    directory: domain
    tests: false
  - name: repository
    directory: repositories
    suffix: repository
    can_import: [domain]
  - name: service
    directory: services
    suffix: service
    can_import: [domain]
  - name: middleware
    directory: middlewares
    scope: shared
    files: [auth]
forbidden:
  - id: no-console-log
    pattern: "console\\\\.log"
    severity: warning
`;

export async function writeProject(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries({ '.layerkit/rules.yaml': RULES_YAML, ...files })) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}
