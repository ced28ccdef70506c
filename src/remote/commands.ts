/**
 * Gateway paths and shell commands
 */

export const TELEGRAF_SERVICE = 'telegraf';
export const REMOTE_TELEGRAF_CONFIG = '/etc/telegraf/telegraf.conf';
export const TELEGRAF_LOG = '/var/log/telegraf/telegraf.log';

export const ACTIVE_STATUS = 'active';

export const TelegrafCommands = {
  restart: `sudo systemctl restart ${TELEGRAF_SERVICE}`,
  isActive: `systemctl is-active --quiet ${TELEGRAF_SERVICE} && echo '${ACTIVE_STATUS}' || echo 'failed'`,
  status: `sudo systemctl status ${TELEGRAF_SERVICE}`,
  recentLogs: `tail -n 20 ${TELEGRAF_LOG}`,
  recentErrors: `tail -n 10 ${TELEGRAF_LOG} | grep 'E!'`,
} as const;

export const INFLUXDB_DATA_DIR = '/var/lib/influxdb2';
export const GRAFANA_CONFIG = '/etc/grafana/grafana.ini';
export const GRAFANA_BACKUP_FILE = 'grafana_backup.ini';

export function influxBackupDir(date: string): string {
  return `/tmp/influx_backup_${date}`;
}

export function influxBackupCommand(remoteDir: string): string {
  return `influx backup -p ${INFLUXDB_DATA_DIR} ${remoteDir}`;
}
