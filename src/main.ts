import { printer, type CommandOptions } from "./commands/context.js"
import { cmdProbeBest } from "./commands/probe.js"
import { cmdSubAdd, cmdSubEdit, cmdSubFilter, cmdSubList, cmdSubRemove, cmdSubUpdate, cmdSubWatch } from "./commands/sub.js"

export const USAGE = `用法:
  subrank sub:add --url <url> [--name N] [--auto] [--interval 86400] [--tags a,b] [--priority 0] [--no-fetch]
  subrank sub:list [--json]
  subrank sub:update [--id <id>]
  subrank sub:remove --id <id>
  subrank sub:edit --id <id> [--name N] [--enable|--disable] [--priority P] [--tags a,b] [--auto|--no-auto] [--interval S]
  subrank sub:filter [--protocols vless,vmess] [--minSuccessRate 0.5] [--maxLatency 800] [--subTags a] [--tags b] [--name RE] [--countries US,JP]
                     [--sort latency|success_rate|name|last_test] [--reverse] [--limit N] [--json]
  subrank sub:watch
  subrank probe:best [--top 10] [--sequential] [--timeoutMs 5000] [--attempts 3] [--concurrency 10] [--sample K] [filter flags] [--json]
`

export async function run(argv: string[], options: CommandOptions = {}) {
  const [command = ""] = argv
  const rest = argv.slice(1)
  switch (command) {
    case "sub:add":
      return await cmdSubAdd(rest, options)
    case "sub:list":
      return await cmdSubList(rest, options)
    case "sub:update":
      return await cmdSubUpdate(rest, options)
    case "sub:remove":
      return await cmdSubRemove(rest, options)
    case "sub:edit":
      return await cmdSubEdit(rest, options)
    case "sub:filter":
      return await cmdSubFilter(rest, options)
    case "sub:watch":
      return await cmdSubWatch(rest, options)
    case "probe:best":
      return await cmdProbeBest(rest, options)
    default:
      printer(options)(USAGE)
  }
}
