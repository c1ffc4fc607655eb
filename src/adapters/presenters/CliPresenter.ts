import Table from 'cli-table3';
import { SourceLocation } from '../../domain/entities';

export class CliPresenter {
  constructor(
    private readonly write: (line: string) => void = (line) => console.log(line),
    private readonly writeError: (line: string) => void = (line) => console.error(line),
  ) {}

  public presentLocation(location: SourceLocation, options: { table?: boolean }): void {
    if (!options.table) {
      this.write(JSON.stringify(location, null, 2));
      return;
    }

    const table = new Table({
      head: ['Repository', 'Revision', 'Path'],
      style: { head: ['cyan'] },
      wordWrap: true,
    });
    table.push([
      location.repository || '(standard library)',
      location.revision || '(default)',
      location.relativePath,
    ]);
    this.write(table.toString());
  }

  public presentError(message: string): void {
    this.writeError(`Error: ${message}`);
  }
}
