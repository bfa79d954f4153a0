/** Line sink for command output; stdout by default */
export type Writer = (line: string) => void;

export const stdoutWriter: Writer = (line) => {
  process.stdout.write(`${line}\n`);
};
