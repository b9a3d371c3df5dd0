/**
 * Main entry point for the flight price tracker CLI
 */

import { runCli } from "./cli/index"

runCli().catch(console.error)
