import { main } from '../cli'
import { logError } from '../lib/errorUtils'

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logError('isolation-tournament', err)
    process.exitCode = 1
  }
)
