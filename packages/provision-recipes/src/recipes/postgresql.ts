import { generatePassword, type Recipe, type SandboxContext } from '@sandbox-provision/engine';
import { shellQuote } from '../templates/index.js';
import { aptInstall, aptUpdate, pipe, run } from './common.js';

export const POSTGRESQL_PACKAGES = ['postgresql', 'postgresql-client'];

const PG_CONF_GLOB = '/etc/postgresql/*/main';

/**
 * /24 network of an IPv4 address, e.g. 10.0.3.0/24 for 10.0.3.17
 */
export function subnetOf(address: string): string {
  return address.replace(/\d+$/, '0/24');
}

/**
 * pg_hba.conf entry letting the subnet reach the database with a password
 */
export function hbaEntry(database: string, user: string, address: string): string {
  return `host\t\t${database}\t\t${user}\t\t${subnetOf(address)}\t\tmd5`;
}

export function listenAddresses(context: SandboxContext): string {
  return `listen_addresses = '${context.name},${context.hostName}'`;
}

export const postgresqlRecipe: Recipe = {
  role: 'postgresql',
  summary: 'PostgreSQL server with a database and an owner reachable from the local subnet',

  plan(prefix) {
    const databaseUser = `${prefix}_user`;
    const databaseName = `${prefix}_db`;
    const databasePassword = generatePassword();

    return {
      steps: context => [
        aptUpdate(),
        aptInstall('Installing packages', POSTGRESQL_PACKAGES),
        run('Configuring pg_hba.conf', [
          'bash', '-c',
          `set -e; for conf in ${PG_CONF_GLOB}/pg_hba.conf; do ` +
            `printf '%s\\n' ${shellQuote(hbaEntry(databaseName, databaseUser, context.address))} >> "$conf"; done`,
        ]),
        // Fails when the commented default is missing
        run('Configuring postgresql.conf', [
          'bash', '-c',
          `set -e; for conf in ${PG_CONF_GLOB}/postgresql.conf; do ` +
            `grep -q '^#listen_addresses' "$conf"; ` +
            `sed -i ${shellQuote(`s/^#listen_addresses.*/${listenAddresses(context)}/`)} "$conf"; done`,
        ]),
        run('Restarting PostgreSQL daemon', ['systemctl', 'restart', 'postgresql']),
        pipe(
          'Creating database user',
          ['printf', '%s\\n', `CREATE USER ${databaseUser} WITH PASSWORD '${databasePassword}';`],
          ['su', '-', 'postgres', '-c', 'psql -v ON_ERROR_STOP=1']
        ),
        run('Creating database', [
          'su', '-', 'postgres', '-c',
          `psql -v ON_ERROR_STOP=1 -c "CREATE DATABASE ${databaseName} OWNER ${databaseUser};"`,
        ]),
      ],

      result: context => ({
        container_name: context.name,
        container_address: context.address,
        database_name: databaseName,
        database_user: databaseUser,
        database_password: databasePassword,
      }),
    };
  },
};
