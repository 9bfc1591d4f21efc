import { ConfigSection, readStringList } from '../config-file';
import { OutputFormat } from '../../types';
import { validateEnum } from '../validators';

const KNOWN_FORMATS: readonly OutputFormat[] = ['json', 'text'];

/**
 * FormatsConfig - Accepted input and output formats (file section `formats`)
 */
export class FormatsConfig {
  readonly input: OutputFormat[];
  readonly output: OutputFormat[];

  constructor(section: ConfigSection = {}) {
    this.input = this.parse(readStringList(section, 'input', KNOWN_FORMATS), 'formats.input');
    this.output = this.parse(readStringList(section, 'output', KNOWN_FORMATS), 'formats.output');
  }

  private parse(values: string[], fieldName: string): OutputFormat[] {
    return values.map((value) => {
      validateEnum(value, KNOWN_FORMATS, fieldName);
      return value;
    });
  }
}
