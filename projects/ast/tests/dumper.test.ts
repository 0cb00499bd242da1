import {
  makeComment,
  makeDynamicType,
  makeKeyword,
  makeSemicolon,
  makeWhitespace,
} from '../builders';
import { Dumper, qualifiedName } from '../dumper';
import { MutableExtrasMap } from '../extras-map';
import { file, int, property, typeRef } from './ast-util';

describe('qualifiedName', () => {
  it('should name keywords by their display name', () => {
    expect(qualifiedName(makeKeyword('='))).toEqual('Node.Keyword.Equal');
    expect(qualifiedName(makeKeyword('fun'))).toEqual('Node.Keyword.Fun');
  });
  it('should group nodes by category', () => {
    expect(qualifiedName(property('x'))).toEqual(
      'Node.Declaration.PropertyDeclaration'
    );
    expect(qualifiedName(int('1'))).toEqual(
      'Node.Expression.ConstantLiteralExpression'
    );
    expect(qualifiedName(makeDynamicType())).toEqual('Node.Type.DynamicType');
    expect(qualifiedName(makeSemicolon())).toEqual('Node.Extra.Semicolon');
  });
  it('should leave other nodes ungrouped', () => {
    expect(qualifiedName(file())).toEqual('Node.KotlinFile');
    expect(qualifiedName(typeRef('Int'))).toEqual('Node.TypeRef');
    expect(qualifiedName(property('x').fields.variables[0])).toEqual(
      'Node.Variable'
    );
  });
});

describe('Dumper', () => {
  it('should indent each level by two spaces', () => {
    expect(Dumper.dump(file(property('x', null, 'Int')))).toEqual(
      [
        'Node.KotlinFile',
        '  Node.Declaration.PropertyDeclaration',
        '    Node.Keyword.Val',
        '    Node.Variable',
        '      Node.Expression.NameExpression',
        '      Node.TypeRef',
        '        Node.Type.SimpleType',
        '          Node.Expression.NameExpression',
      ].join('\n')
    );
  });

  it('should add scalar fields in verbose mode', () => {
    expect(Dumper.dump(property('x', int('1')), { verbose: true })).toEqual(
      [
        'Node.Declaration.PropertyDeclaration',
        '  Node.Keyword.Val{text="val"}',
        '  Node.Variable',
        '    Node.Expression.NameExpression{text="x"}',
        '  Node.Keyword.Equal{text="="}',
        '  Node.Expression.ConstantLiteralExpression{text="1", form="int"}',
      ].join('\n')
    );
  });

  it('should escape field values', () => {
    const comment = makeComment({
      text: '// "q"\t\\',
      startsLine: true,
      endsLine: false,
    });
    expect(Dumper.dump(comment, { verbose: true })).toEqual(
      'Node.Extra.Comment{text="// \\"q\\"\\t\\\\", startsLine="true", endsLine="false"}'
    );
    expect(Dumper.dump(makeWhitespace('\r\n'), { verbose: true })).toEqual(
      'Node.Extra.Whitespace{text="\\r\\n"}'
    );
  });

  it('should place extras around and inside their nodes', () => {
    const decl = property('x', int('1'));
    const root = file(decl);
    const extras = new MutableExtrasMap();
    extras.setBefore(root, [makeWhitespace(' ')]);
    extras.setBefore(decl, [makeWhitespace('\n')]);
    extras.setAfter(decl.fields.valOrVarKeyword, [makeWhitespace(' ')]);
    extras.setAfter(decl, [
      makeComment({ text: '// x', startsLine: false, endsLine: true }),
    ]);
    extras.setWithin(root, [makeWhitespace('\n')]);
    expect(Dumper.dump(root, { extrasMap: extras })).toEqual(
      [
        'Node.KotlinFile',
        '  BEFORE: Node.Extra.Whitespace',
        '  Node.Declaration.PropertyDeclaration',
        '    Node.Keyword.Val',
        '    AFTER: Node.Extra.Whitespace',
        '    Node.Variable',
        '      Node.Expression.NameExpression',
        '    Node.Keyword.Equal',
        '    Node.Expression.ConstantLiteralExpression',
        '  AFTER: Node.Extra.Comment',
        '  WITHIN: Node.Extra.Whitespace',
      ].join('\n')
    );
  });
});
