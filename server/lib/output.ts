/**
 * Where query results and SQL errors go. Unlike the logger, output is never
 * filtered by log level.
 */

export interface Output {
  print(line: string): void
  printError(line: string): void
}

export function createStreamOutput(
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr
): Output {
  return {
    print: (line) => {
      stdout.write(`${line}\n`)
    },
    printError: (line) => {
      stderr.write(`${line}\n`)
    },
  }
}
