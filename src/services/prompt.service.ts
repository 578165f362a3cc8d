import inquirer from "inquirer";
import type { IPromptService } from "../interfaces/prompt.interface";

export class PromptService implements IPromptService {
  isInteractive(): boolean {
    return process.stdin.isTTY === true;
  }

  async input(message: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([{
      type: "input",
      name: "answer",
      message,
    }]);
    return answer.trim();
  }

  async secret(message: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([{
      type: "password",
      name: "answer",
      message,
      mask: "*",
    }]);
    return answer.trim();
  }
}
