/**
 * Validate Command Handler
 *
 * Checks a deployment file against the schema and the semantic rules
 * without contacting Azure.
 */

import type { CommonOptions } from '../session.js';
import { loadDeployment, runCommand } from '../session.js';

/**
 * Execute the validate command.
 *
 * @param file - Path to the deployment file
 */
export async function validateCommand(file: string, options: CommonOptions): Promise<void> {
  await runCommand('validate', options, async (log) => {
    log.info(`Validating configuration: ${file}`);
    const config = await loadDeployment(file);

    log.success('Configuration is valid');
    log.info(`  Deployment: ${config.deployment.name}`);
    log.info(`  Machines:   ${config.machines.length}`);
    log.newline();
    log.table(
      ['NAME', 'RESOURCE NAME', 'SIZE', 'LOCATION', 'DISKS'],
      config.machines.map((m) => [m.name, m.machineName, m.size, m.location, String(Object.keys(m.disks).length)])
    );

    if (!config.azure.subscriptionId) {
      log.warning('no Azure subscription configured; set azure.subscription_id or AZURE_SUBSCRIPTION_ID before deploying');
    }

    log.addData('valid', true);
    log.addData('deployment', config.deployment.name);
    log.addData(
      'machines',
      config.machines.map((m) => ({ name: m.name, machineName: m.machineName, disks: Object.keys(m.disks) }))
    );
  });
}
