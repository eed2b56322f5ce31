/**
 * Tests for the plan command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createPlanCommand } from '../../../../src/cli/commands/plan.js';
import { writeProject } from './fixtures.js';

const mockLogger = vi.hoisted(() => {
  const logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), success: vi.fn(), debug: vi.fn(), child: vi.fn() };
  logger.child.mockImplementation(() => logger);
  return logger;
});

vi.mock('../../../../src/utils/logger.js', () => ({ logger: mockLogger }));

vi.mock('chalk', () => {
  const identity = (s: string): string => s;
  return { default: { dim: identity, green: identity, red: identity } };
});

vi.spyOn(process, 'exit').mockImplementation((code) => {
  throw new Error(`process.exit(${code})`);
});
const cwdSpy = vi.spyOn(process, 'cwd');
const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

const PLANNED = [
  'src/domain/order.ts',
  'src/middlewares/auth.test.ts',
  'src/middlewares/auth.ts',
  'src/repositories/order-repository.test.ts',
  'src/repositories/order-repository.ts',
  'src/services/order-service.test.ts',
  'src/services/order-service.ts',
];

describe('plan command', () => {
  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'layerkit-plan-'));
    cwdSpy.mockReturnValue(dir);
    await writeProject(dir, { 'features.md': '# Shop\n- Order: create\n' });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should print the plan without writing files', async () => {
    await createPlanCommand().parseAsync(['node', 'test', 'features.md']);

    const output = String(consoleSpy.mock.calls[0][0]);
    expect(output).toContain('src/services/ [service]');
    expect(output).toContain('7 files, 6 imports');
    expect(output).toContain('7 to create, 0 existing');
    const lines = output.split('\n');
    expect(lines[lines.length - 1]).toBe('Plan satisfies the rules');
    await expect(fs.access(path.join(dir, 'src/domain/order.ts'))).rejects.toThrow();
  });

  it('should print JSON with --json', async () => {
    await createPlanCommand().parseAsync(['node', 'test', 'features.md', '--json']);

    const parsed: unknown = JSON.parse(String(consoleSpy.mock.calls[0][0]));
    expect(parsed).toMatchObject({
      validation: { passed: true },
      reconciliation: { create: PLANNED, existing: [], extra: [] },
    });
  });

  it('should write skeletons with --write and skip existing files', async () => {
    await fs.mkdir(path.join(dir, 'src/domain'), { recursive: true });
    await fs.writeFile(path.join(dir, 'src/domain/order.ts'), 'export interface Order { id: string }\n');

    await createPlanCommand().parseAsync(['node', 'test', 'features.md', '--write']);

    expect(mockLogger.success).toHaveBeenCalledWith('Created 6 file(s); 1 already existed');
    expect(await fs.readFile(path.join(dir, 'src/services/order-service.ts'), 'utf-8')).toBe(
      [
        '// layerkit skeleton: layer=service entity=Order',
        '// operations: create',
        '',
        "import * as order from '../domain/order.js';",
        "import * as orderRepository from '../repositories/order-repository.js';",
        '',
        'export {};',
        '',
      ].join('\n')
    );
    expect(await fs.readFile(path.join(dir, 'src/domain/order.ts'), 'utf-8')).toBe(
      'export interface Order { id: string }\n'
    );
  });

  it('should read YAML descriptors and config defaults', async () => {
    await writeProject(dir, {
      '.layerkit/config.yaml': 'features:\n  default_operations: [list]\n',
      'features.yaml': 'features:\n  - entity: invoice\n',
    });

    await createPlanCommand().parseAsync(['node', 'test', 'features.yaml', '--json']);

    const output = String(consoleSpy.mock.calls[0][0]);
    expect(output).toContain('"path": "src/services/invoice-service.ts"');
    expect(output).toContain('"operations": [\n          "list"\n        ]');
  });

  it('should exit with 1 when the descriptor is missing', async () => {
    await expect(createPlanCommand().parseAsync(['node', 'test', 'missing.md'])).rejects.toThrow('process.exit(1)');

    expect(String(mockLogger.error.mock.calls[0][0])).toBe(`Feature descriptor not found: ${path.join(dir, 'missing.md')}`);
  });

  it('should exit with 1 on descriptor errors', async () => {
    await writeProject(dir, { 'bad.md': '- Order\n  - fields: owner:Ghost\n' });

    await expect(createPlanCommand().parseAsync(['node', 'test', 'bad.md'])).rejects.toThrow('process.exit(1)');
    expect(String(mockLogger.error.mock.calls[0][0])).toContain('unknown type "Ghost"');
  });
});
