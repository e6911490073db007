import "dotenv/config";
import { createServices, type Services } from "./services";
import { createLogger } from "./shared/logger";
import type { Employee } from "./shared/types";
import { formatDate } from "./shared/date-utils";

const log = createLogger("seed");

export interface AdminSeed {
  email: string;
  password: string;
}

/** Creates the first administrator unless an account with that email exists. */
export async function ensureDefaultAdmin(
  services: Pick<Services, "employees" | "settings" | "clock">,
  seed: AdminSeed
): Promise<{ admin: Employee; created: boolean }> {
  await services.settings.get();

  const existing = await services.employees.getByEmail(seed.email);
  if (existing) {
    return { admin: existing, created: false };
  }

  const admin = await services.employees.create({
    email: seed.email,
    password: seed.password,
    firstName: "System",
    lastName: "Administrator",
    role: "admin",
    department: "IT",
    position: "System Administrator",
    hireDate: formatDate(services.clock()),
  });
  return { admin, created: true };
}

async function main() {
  const password = process.env.SEED_ADMIN_PASSWORD;
  if (!password) {
    throw new Error("SEED_ADMIN_PASSWORD is required");
  }
  const services = await createServices({ dataDir: process.env.DATA_DIR || "data" });
  const { admin, created } = await ensureDefaultAdmin(services, {
    email: process.env.SEED_ADMIN_EMAIL || "admin@company.com",
    password,
  });

  if (created) {
    log.info("Created admin user", { id: admin.id, email: admin.email });
  } else {
    log.info("Admin user already exists", { email: admin.email });
  }
}

if (require.main === module) {
  main().catch((err) => {
    log.error("Seeding failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}
