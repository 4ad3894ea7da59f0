import * as readlineSync from 'readline-sync';
import { Environment } from '../parameters/environments';
import { COLORS } from '../constants';
import { DeploymentAbortedError } from '../errors';

const BOX_WIDTH = 60;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[\d+m/g;

/**
 * Draw a framed console banner. Lines may carry ANSI codes; padding uses their visible width.
 */
function renderBox(color: string, lines: string[]): string {
  const border = (left: string, right: string): string =>
    `${color}${left}${'─'.repeat(BOX_WIDTH)}${right}${COLORS.color_reset}`;
  const body = lines.map((line) => {
    const padding = Math.max(BOX_WIDTH - line.replace(ANSI_PATTERN, '').length, 0);
    return `${color}│${COLORS.color_reset}${line}${' '.repeat(padding)}${color}│${COLORS.color_reset}`;
  });
  return ['', border('╭', '╮'), ...body, border('╰', '╯'), ''].join('\n');
}

/**
 * Validate and confirm deployment
 * - Display project name and environment name
 * - Verify that the account ID matches the CDK account
 * - Request user confirmation for the production environment
 *
 * @param currentAccount - Account the CDK CLI resolved
 * @throws {DeploymentAbortedError} If the account ID does not match or the user declines
 */
export function validateDeployment(
  pjName: string,
  envName: string,
  accountId?: string,
  currentAccount: string | undefined = process.env.CDK_DEFAULT_ACCOUNT,
): void {
  console.log(`Project Name: ${pjName}`);
  console.log(`Environment Name: ${envName}`);

  if (accountId && accountId !== currentAccount) {
    console.log(
      renderBox(COLORS.color_yellow, [
        `${COLORS.color_bold} ACCOUNT MISMATCH WARNING${COLORS.color_reset}`,
        '',
        '  The provided account ID does not match the current',
        '  CDK account.',
        '',
        `${COLORS.color_dim}  Expected: ${accountId}${COLORS.color_reset}`,
        `${COLORS.color_dim}  Current:  ${currentAccount ?? '(not set)'}${COLORS.color_reset}`,
        '',
      ]),
    );
    throw new DeploymentAbortedError('Account ID mismatch. Deployment aborted.');
  }

  if (envName === Environment.PRODUCTION) {
    console.log(
      renderBox(COLORS.color_red, [
        `${COLORS.color_bold} PRODUCTION DEPLOYMENT${COLORS.color_reset}`,
        '',
        '  This is a production release.',
        '  Please review carefully before proceeding.',
        '',
      ]),
    );

    const answer = readlineSync.question('Are you sure you want to proceed? (yes/no): ');
    if (answer.trim().toLowerCase() !== 'yes') {
      throw new DeploymentAbortedError('Deployment aborted by user.');
    }
    console.log(`${COLORS.color_green}✓${COLORS.color_reset} Proceeding with deployment...`);
  }
}
