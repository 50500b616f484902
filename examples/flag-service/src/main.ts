import { run } from "./run"

run().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
