export interface ConfirmationGatePort {
  prompt(message: string): Promise<string>;
}
