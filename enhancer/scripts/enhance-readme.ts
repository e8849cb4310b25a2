import { buildProgram } from '../src/cli'
import { EnhanceError } from '../src/utils/errors'

async function main() {
  await buildProgram().parseAsync(process.argv)
}

main().catch((error: unknown) => {
  if (error instanceof EnhanceError) {
    console.error(`[${error.code}] ${error.message}`)
    process.exit(error.exitCode)
  }
  console.error(error)
  process.exit(1)
})
