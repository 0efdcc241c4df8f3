import { confirm } from '@inquirer/prompts';

// Skipped confirmations are answered yes
export async function autoConfirm(
  message: string,
  skipConfirmation: boolean,
): Promise<boolean> {
  if (skipConfirmation) return true;
  return confirm({ message, default: false });
}
