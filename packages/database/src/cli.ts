// =============================================================================
// DATABASE COMMANDS
// =============================================================================
// Usage: tsx src/cli.ts migrate
//        tsx src/cli.ts seed [count]

import { createPool, disconnectDatabase, poolQueryable } from './client'
import { DatabaseService } from './index'
import { migrate } from './migrate'
import { seedCatalog } from './seed'

async function main(command: string | undefined, args: string[]): Promise<void> {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    throw new Error('DATABASE_URL is required')
  }

  const pool = createPool({ connectionString })

  try {
    switch (command) {
      case 'migrate':
        await migrate(poolQueryable(pool))
        console.log('Schema applied')
        break

      case 'seed': {
        const count = Number(args[0] ?? 1000)
        await migrate(poolQueryable(pool))
        const result = await seedCatalog(new DatabaseService(pool), {
          translations: Number.isFinite(count) && count > 0 ? count : 1000,
          onProgress: (seeded) => console.log(`Seeded ${seeded} translations`),
        })
        console.log(`Seeding completed: ${result.translations} translations, ${result.tags} tags`)
        break
      }

      default:
        throw new Error(`Unknown command "${command ?? ''}". Expected "migrate" or "seed".`)
    }
  } finally {
    await disconnectDatabase(pool)
  }
}

if (require.main === module) {
  main(process.argv[2], process.argv.slice(3)).catch((error: unknown) => {
    console.error('Database command failed:', error)
    process.exit(1)
  })
}
