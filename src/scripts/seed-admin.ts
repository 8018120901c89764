// src/scripts/seed-admin.ts
// ============================================================================
// Reset the password of the seeded admin (admin@example.com, default tenant).
//   npm run seed:admin -- --password=<new password>   (default: "password")
// ============================================================================

import { closeDb, query } from "../libs/db.js";
import { hashPassword } from "../libs/crypto.js";
import { createChildLogger } from "../libs/logger.js";
import { settings } from "../libs/settings.js";

const ADMIN_EMAIL = "admin@example.com";

const log = createChildLogger({ script: "seed-admin" });

function passwordArg(argv: string[]): string {
  const flag = argv.find((arg) => arg.startsWith("--password="));
  const value = flag?.slice("--password=".length) ?? "password";
  if (value.length < 8) {
    throw new Error("--password must be at least 8 characters long.");
  }
  return value;
}

async function main() {
  try {
    await resetAdminPassword();
  } finally {
    await closeDb();
  }
}

async function resetAdminPassword() {
  const hash = await hashPassword(passwordArg(process.argv.slice(2)));
  const tenantId = settings.tenancy.defaultTenantId;

  const rows = await query<{ id: string }>(
    `
      UPDATE users
         SET hashed_password = $1,
             is_active = true
       WHERE tenant_id = $2
         AND email = $3
      RETURNING id;
    `,
    [hash, tenantId, ADMIN_EMAIL],
  );

  if (rows.length === 0) {
    throw new Error(`No ${ADMIN_EMAIL} in tenant ${tenantId}. Was db/init.sql applied?`);
  }

  log.info({ tenantId, userId: rows[0]?.id }, "admin password reset");
}

main().catch((err) => {
  log.error({ err }, "seed failed");
  process.exit(1);
});
