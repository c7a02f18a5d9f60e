import { run } from "./run"

run()
  .then(({ session }) => {
    const shutdown = () => {
      session.stop().then(
        () => process.exit(0),
        () => process.exit(1),
      )
    }

    process.once("SIGINT", shutdown)
    process.once("SIGTERM", shutdown)
  })
  .catch(() => {
    // parse() has already logged the failure at fatal level
    process.exitCode = 1
  })
