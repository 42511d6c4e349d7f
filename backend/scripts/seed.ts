// scripts/seed.ts — Seed reference data (roles, sections, sub-sections, users)
// Idempotent: existing rows are matched by their natural keys and left alone.
//
// Usage:
//   npm run db:seed

import fs from 'node:fs';
import path from 'node:path';
import { and, eq } from 'drizzle-orm';
import { z } from 'zod';
import { loadConfig } from '../src/config/index.js';
import { logger } from '../src/config/logger.js';
import { createDatabase, type Database } from '../src/models/db.js';
import { sections, subSections, userRoleMapping, userRoles, users } from '../src/models/schema.js';
import { RoleName } from '../src/types/index.js';

const log = logger.child({ service: 'seed' });

const SeedSchema = z.object({
  roles: z.array(z.object({ name: z.nativeEnum(RoleName), description: z.string() })),
  sections: z.array(
    z.object({
      name: z.string().min(1),
      code: z.string().min(1).max(16),
      description: z.string(),
      subSections: z.array(z.string().min(1)),
    })
  ),
  users: z.array(
    z.object({
      username: z.string().min(1),
      fullName: z.string().min(1),
      designation: z.string().nullable(),
      section: z.string().nullable(),
      subSection: z.string().nullable(),
      isSectionHead: z.boolean(),
      isSuperuser: z.boolean(),
      roles: z.array(z.nativeEnum(RoleName)),
    })
  ),
});

type SeedData = z.infer<typeof SeedSchema>;

async function seedRoles(db: Database, data: SeedData): Promise<Map<string, number>> {
  const ids = new Map<string, number>();
  for (const role of data.roles) {
    await db.insert(userRoles).values(role).onConflictDoNothing({ target: userRoles.name });
    const [row] = await db.select({ id: userRoles.id }).from(userRoles).where(eq(userRoles.name, role.name));
    if (row) {
      ids.set(role.name, row.id);
    }
  }
  log.info({ count: ids.size }, 'Roles seeded');
  return ids;
}

async function seedSections(
  db: Database,
  data: SeedData
): Promise<{ sectionIds: Map<string, number>; subSectionIds: Map<string, number> }> {
  const sectionIds = new Map<string, number>();
  const subSectionIds = new Map<string, number>();

  for (const section of data.sections) {
    await db
      .insert(sections)
      .values({ name: section.name, code: section.code, description: section.description })
      .onConflictDoNothing({ target: sections.name });
    const [row] = await db.select({ id: sections.id }).from(sections).where(eq(sections.name, section.name));
    if (!row) {
      continue;
    }
    sectionIds.set(section.code, row.id);

    for (const name of section.subSections) {
      const existing = await db
        .select({ id: subSections.id })
        .from(subSections)
        .where(and(eq(subSections.sectionId, row.id), eq(subSections.name, name)));
      const subSectionId =
        existing[0]?.id ??
        (await db.insert(subSections).values({ sectionId: row.id, name }).returning({ id: subSections.id }))[0]?.id;
      if (subSectionId !== undefined) {
        subSectionIds.set(`${section.code}/${name}`, subSectionId);
      }
    }
  }

  log.info({ sections: sectionIds.size, subSections: subSectionIds.size }, 'Sections seeded');
  return { sectionIds, subSectionIds };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, 'seed-data.json'), 'utf-8'));
  const data = SeedSchema.parse(raw);

  const database = createDatabase(config.DATABASE_URL, 1);
  try {
    const { db } = database;
    const roleIds = await seedRoles(db, data);
    const { sectionIds, subSectionIds } = await seedSections(db, data);

    for (const user of data.users) {
      const sectionId = user.section ? sectionIds.get(user.section) ?? null : null;
      const subSectionId =
        user.section && user.subSection ? subSectionIds.get(`${user.section}/${user.subSection}`) ?? null : null;

      await db
        .insert(users)
        .values({
          username: user.username,
          fullName: user.fullName,
          designation: user.designation,
          sectionId,
          subSectionId,
          isSectionHead: user.isSectionHead,
          isSuperuser: user.isSuperuser,
        })
        .onConflictDoNothing({ target: users.username });

      const [row] = await db.select({ id: users.id }).from(users).where(eq(users.username, user.username));
      if (!row) {
        continue;
      }
      for (const role of user.roles) {
        const roleId = roleIds.get(role);
        if (roleId !== undefined) {
          await db.insert(userRoleMapping).values({ userId: row.id, roleId }).onConflictDoNothing();
        }
      }
    }

    log.info({ users: data.users.length }, 'Users seeded');
  } finally {
    await database.close();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Seeding failed');
  process.exit(1);
});
