/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: phaseguard [command] [options]

Commands:
  install                             Run the deployment phases (default)
  status                              Show the saved installation state
  reset                               Archive the saved state so the next install starts fresh
  backups [list]                      List backups, newest first
  backups verify <name>               Re-check a backup's checksums
  backups prune                       Delete old backups (the newest is always kept)
  restore [<name>|--latest]           Restore deployment files from a backup

Options:
  --config <file>                     Deployment file (default: phaseguard.json)
  --state-dir <dir>                   State directory (default: .phaseguard)
  --resume                            Continue the interrupted installation
  --skip-checks                       Skip the pre-flight checks
  --force-rerun <phases>              Comma-separated succeeded phases to run again
                                      (non-idempotent phases only)
  --skip-phase <phases>               Comma-separated phases to mark skipped
  --keep <n>                          backups prune: number of backups to keep
  --max-age-days <n>                  backups prune: delete backups older than n days
  --latest                            restore: use the newest backup
  -y, --yes                           restore: do not ask for confirmation
  --no-interactive                    Disable interactive prompts; use defaults or fail
  --verbose                           Enable verbose output with more progress details
  --debug                             Enable debug mode with full diagnostics
  --json                              Output machine-readable JSON
  -h, --help                          Show this help message
  -v, --version                       Show version number

Exit codes:
  0 success, 1 unexpected error, 2 usage error, 3 pre-flight failure,
  4 phase failure, 5 configuration drift, 6 state or lock error,
  7 backup error, 8 restore error, 130 interrupted

Examples:
  phaseguard install
  phaseguard install --resume
  phaseguard install --resume --skip-phase configure-dns
  phaseguard install --resume --force-rerun seed-database
  phaseguard backups prune --keep 5
  phaseguard restore --latest --yes`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
