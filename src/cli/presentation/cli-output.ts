import { Injectable } from '@nestjs/common';

@Injectable()
export class CliOutput {
  print(text: string): void {
    process.stdout.write(`${text}\n`);
  }

  printError(text: string): void {
    process.stderr.write(`${text}\n`);
  }
}
