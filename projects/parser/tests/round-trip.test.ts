import * as fs from 'fs';
import * as path from 'path';
import { Dumper } from '../../ast/dumper';
import { MutableVisitor } from '../../ast/mutable-visitor';
import { preorderIter } from '../../ast/visitor';
import { Writer } from '../../ast/writer';
import { slotMismatches } from '../../ast/tests/ast-util';
import { KotlinParser } from '../parser';

const FIXTURES = path.join(__dirname, 'fixtures');

const sources: [string, string][] = fs
  .readdirSync(FIXTURES)
  .filter((name) => name.endsWith('.kt'))
  .sort()
  .map((name) => [name, fs.readFileSync(path.join(FIXTURES, name), 'utf8')]);

describe('round trip', () => {
  it('should find the fixtures', () => {
    expect(sources.length).toEqual(12);
  });

  describe.each(sources)('%s', (_name, source) => {
    it('should write the source back unchanged', () => {
      const { file, extrasMap } = KotlinParser.parseFile(source);
      expect(Writer.write(file, extrasMap)).toEqual(source);
    });

    it('should write the same text after an identity mutation', () => {
      const { file, extrasMap } = KotlinParser.parseFile(source);
      const same = MutableVisitor.traverse(file, {
        extrasMap,
        preVisit: (p) => p.node,
        postVisit: (p) => p.node,
      });
      expect(same).toBe(file);
      expect(Writer.write(same, extrasMap)).toEqual(source);
    });

    it('should re-parse the output written without extras', () => {
      const { file } = KotlinParser.parseFile(source);
      const reparsed = KotlinParser.parseFile(Writer.write(file), {
        extras: false,
      }).file;
      expect(Dumper.dump(reparsed, { verbose: true })).toEqual(
        Dumper.dump(file, { verbose: true })
      );
    });

    it('should fill every slot with a child the visitor reaches', () => {
      const { file } = KotlinParser.parseFile(source);
      expect(slotMismatches(file)).toEqual([]);
    });
  });

  it('should re-parse heuristic output to the same tree', () => {
    const source =
      'fun f(x: Any) = when (x) {\n    is String -> x.length\n    else -> -1\n}';
    const { file } = KotlinParser.parseFile(source);
    const written = Writer.write(file);
    expect(written).toEqual(
      'fun f(x:Any)=when(x){is String->x.length\nelse->-1}'
    );
    const reparsed = KotlinParser.parseFile(written, { extras: false }).file;
    expect(Dumper.dump(reparsed, { verbose: true })).toEqual(
      Dumper.dump(file, { verbose: true })
    );
  });

  it('should visit a function in source order', () => {
    const { file } = KotlinParser.parseFile('fun f(a: Int) = a');
    expect([...preorderIter(file)].map((node) => node.name)).toEqual([
      'KotlinFile',
      'FunctionDeclaration',
      'Keyword',
      'NameExpression',
      'FunctionParams',
      'FunctionParam',
      'NameExpression',
      'TypeRef',
      'SimpleType',
      'NameExpression',
      'Keyword',
      'NameExpression',
    ]);
  });
});
