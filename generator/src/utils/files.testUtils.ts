import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi, type Mock } from 'vitest';
import type { Logger } from './logger.js';

export function createTempTree(files: Record<string, string | Buffer>): string {
  const root = mkdtempSync(join(tmpdir(), 'apidocs-'));
  writeTreeFiles(root, files);
  return root;
}

export function writeTreeFiles(root: string, files: Record<string, string | Buffer>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

export function removeTempTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export interface MockLogger extends Logger {
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function createSilentLogger(): MockLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export const USER_CONTROLLER_SOURCE = `<?php

namespace App\\Controllers;

#[RouteGroup('/api/users')]
class UserController
{
    #[Route('/{id}', method: 'GET', description: 'Fetch user')]
    public function show(array $request): void {}

    #[Route('', method: 'POST', description: 'Create user', middleware: ['auth'])]
    public function store(array $request): void {}
}
`;

export const REPORT_CONTROLLER_SOURCE = `<?php

class ReportController
{
    public function export(): void {}
}
`;

export const BILLING_ROUTES_SOURCE = `<?php

Router::group('/api/billing', ['auth', 'tenant']);
Router::get('/invoices', [InvoiceController::class, 'index']);
Router::delete('/invoices/{id}', [InvoiceController::class, 'destroy']);
`;

export function createBackendTree(): string {
  return createTempTree({
    'backend/app/Controllers/UserController.php': USER_CONTROLLER_SOURCE,
    'backend/app/Controllers/ReportController.php': REPORT_CONTROLLER_SOURCE,
    'backend/app/Console/Commands/MakeModuleCommand.php': "<?php\n#[Route('/stub')]\nfunction stub() {}\n",
    'backend/app/Docs/readme.txt': "#[Route('/txt')]\n",
    'backend/modules/Billing/routes.php': BILLING_ROUTES_SOURCE
  });
}
