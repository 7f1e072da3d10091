import { randomUUID } from 'node:crypto';
import {
  loadConfig,
  AdminCliConfigSchema,
  createLogger,
  Argon2PasswordHasher,
  type AdminCliConfig,
} from '@giftpair/shared';
import { type AdminRepository, type PasswordHasher, type WithTransaction } from '@giftpair/domain';
import { UsernameSchema, PasswordSchema } from '@giftpair/proto';
import { initPool, closePool, withTransaction, PgAdminRepository } from '@giftpair/db';

const logger = createLogger({ name: 'admin-cli' });

export interface AdminCliDeps {
  adminRepo: AdminRepository;
  passwordHasher: PasswordHasher;
  withTransaction: WithTransaction;
  generateId: () => string;
  env: Pick<AdminCliConfig, 'ADMIN_USERNAME' | 'ADMIN_PASSWORD'>;
  write: (line: string) => void;
}

const USAGE = `Usage: admin-cli <command> [--force]

Commands:
  create     Create the admin named by ADMIN_USERNAME with ADMIN_PASSWORD
             (--force resets the password when the admin exists)
  delete     Delete the admin named by ADMIN_USERNAME
  list       List every admin
  help       Show this message`;

function readUsername(deps: AdminCliDeps): string | null {
  const parsed = UsernameSchema.safeParse(deps.env.ADMIN_USERNAME);
  if (!parsed.success) {
    deps.write(`Error: ADMIN_USERNAME must be set to a valid username (${parsed.error.issues[0].message})`);
    return null;
  }
  return parsed.data;
}

async function createAdmin(deps: AdminCliDeps, force: boolean): Promise<number> {
  const username = readUsername(deps);
  if (username === null) return 1;

  const password = PasswordSchema.safeParse(deps.env.ADMIN_PASSWORD);
  if (!password.success) {
    deps.write(`Error: ADMIN_PASSWORD must be set (${password.error.issues[0].message})`);
    return 1;
  }

  const passwordHash = await deps.passwordHasher.hash(password.data);

  return deps.withTransaction(async (tx) => {
    const existing = await deps.adminRepo.findByUsername(tx, username);
    if (existing) {
      if (!force) {
        deps.write(`Admin '${username}' already exists. Re-run with --force to reset its password.`);
        return 1;
      }
      await deps.adminRepo.updatePassword(tx, existing.id, passwordHash);
      deps.write(`Password of admin '${username}' updated.`);
      return 0;
    }

    const admin = await deps.adminRepo.create(tx, { id: deps.generateId(), username, passwordHash });
    deps.write(`Admin '${admin.username}' created.`);
    deps.write(`  ID: ${admin.id}`);
    deps.write(`  Created at: ${admin.createdAt.toISOString()}`);
    return 0;
  });
}

async function deleteAdmin(deps: AdminCliDeps): Promise<number> {
  const username = readUsername(deps);
  if (username === null) return 1;

  return deps.withTransaction(async (tx) => {
    const existing = await deps.adminRepo.findByUsername(tx, username);
    if (!existing) {
      deps.write(`Admin '${username}' does not exist.`);
      return 1;
    }
    await deps.adminRepo.delete(tx, existing.id);
    deps.write(`Admin '${username}' deleted.`);
    return 0;
  });
}

async function listAdmins(deps: AdminCliDeps): Promise<number> {
  const admins = await deps.withTransaction((tx) => deps.adminRepo.list(tx));
  if (admins.length === 0) {
    deps.write('No admin found.');
    return 0;
  }

  deps.write(`Admins (${admins.length}):`);
  for (const admin of admins) {
    deps.write(`  ${admin.username}  id=${admin.id}  created=${admin.createdAt.toISOString()}`);
  }
  return 0;
}

/** Runs one command and resolves to the process exit code. */
export async function runAdminCommand(args: readonly string[], deps: AdminCliDeps): Promise<number> {
  const command: string | undefined = args[0];
  const flags = args.slice(1);

  switch (command?.toLowerCase()) {
    case 'create':
      return createAdmin(deps, flags.includes('--force'));
    case 'delete':
      return deleteAdmin(deps);
    case 'list':
      return listAdmins(deps);
    case 'help':
    case '--help':
      deps.write(USAGE);
      return 0;
    case undefined:
      deps.write('Error: no command given.');
      deps.write(USAGE);
      return 1;
    default:
      deps.write(`Error: unknown command '${command}'.`);
      deps.write(USAGE);
      return 1;
  }
}

async function main() {
  const config = loadConfig(AdminCliConfigSchema);
  initPool({ connectionString: config.DATABASE_URL });

  try {
    const code = await runAdminCommand(process.argv.slice(2), {
      adminRepo: new PgAdminRepository(),
      passwordHasher: new Argon2PasswordHasher({
        memoryCost: config.ARGON2_MEMORY_COST,
        timeCost: config.ARGON2_TIME_COST,
      }),
      withTransaction,
      generateId: () => randomUUID(),
      env: config,
      write: (line) => process.stdout.write(`${line}\n`),
    });
    process.exitCode = code;
  } finally {
    await closePool();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Admin command failed');
    process.exit(1);
  });
}
