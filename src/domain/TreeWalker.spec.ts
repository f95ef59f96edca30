import { at, ident, named, token, tree } from '../test/builders';
import { HighlightingKind } from './HighlightingKind';
import { Decl, MacroLocation, TreeNode } from './tree';
import { TreeWalker } from './TreeWalker';

describe('TreeWalker', () => {
  const walk = (text: string, nodes: TreeNode[]) => new TreeWalker(tree(text, nodes)).walk();

  const foo: Decl = { ...named('Foo', at(0, 6)), kind: 'Record', isLambda: false };
  const run: Decl = { ...named('run'), kind: 'Method', isStatic: false };
  const count: Decl = { ...named('count'), kind: 'Field' };

  describe('declarations', () => {
    it('should emit the declaration kind at its name', () => {
      const result = walk('class Foo {};', [{ shape: 'declaration', decl: foo }]);
      expect(result.tokens).toEqual([token(HighlightingKind.Class, 0, 6, 9)]);
      expect(result.diagnostics).toEqual([]);
    });

    it('should skip names that are not written as identifiers', () => {
      const destructor: Decl = {
        id: '~Foo',
        name: { kind: 'destructor', text: '~Foo' },
        location: at(0, 0),
        kind: 'Method',
        isStatic: false,
      };
      expect(walk('~Foo();', [{ shape: 'declaration', decl: destructor }]).tokens).toEqual([]);
    });

    it('should emit the target of a namespace alias', () => {
      const target: Decl = { ...named('b'), kind: 'Namespace' };
      const alias: Decl = {
        ...named('a', at(0, 10)),
        kind: 'NamespaceAlias',
        aliased: target,
        targetNameLocation: at(0, 14),
      };
      expect(walk('namespace a = b;', [{ shape: 'declaration', decl: alias }]).tokens).toEqual([
        token(HighlightingKind.Namespace, 0, 10, 11),
        token(HighlightingKind.Namespace, 0, 14, 15),
      ]);
    });

    it('should classify using declarations by their shadowed declarations', () => {
      const f1: Decl = { ...named('f'), kind: 'Function' };
      const f2: Decl = { ...named('f'), kind: 'Function' };
      const using: Decl = { ...named('f', at(0, 10)), kind: 'Using', shadows: [f1, f2] };
      expect(walk('using ns::f;', [{ shape: 'declaration', decl: using }]).tokens).toEqual([
        token(HighlightingKind.Function, 0, 10, 11),
      ]);
    });

    it('should highlight auto with its deduced type', () => {
      const v: Decl = { ...named('v', at(0, 5)), kind: 'Variable', storage: 'local' };
      const node: TreeNode = {
        shape: 'declaration',
        decl: v,
        placeholder: { location: at(0, 0), deduced: { kind: 'Builtin', name: 'int' } },
      };
      expect(walk('auto v = 1;', [node]).tokens).toEqual([
        token(HighlightingKind.LocalVariable, 0, 5, 6),
        token(HighlightingKind.Primitive, 0, 0, 4),
      ]);
    });

    it('should leave auto alone when nothing was deduced', () => {
      const v: Decl = { ...named('v', at(0, 5)), kind: 'Variable', storage: 'local' };
      const node: TreeNode = { shape: 'declaration', decl: v, placeholder: { location: at(0, 0) } };
      expect(walk('auto v = f();', [node]).tokens).toEqual([token(HighlightingKind.LocalVariable, 0, 5, 6)]);
    });
  });

  describe('references', () => {
    it('should emit the referenced declaration kind', () => {
      const obj: Decl = { ...named('obj'), kind: 'Variable', storage: 'local' };
      const result = walk('obj.run();', [
        { shape: 'declRef', name: ident('obj'), location: at(0, 0), decl: obj },
        { shape: 'memberAccess', name: ident('run'), location: at(0, 4), decl: run },
      ]);
      expect(result.tokens).toEqual([
        token(HighlightingKind.LocalVariable, 0, 0, 3),
        token(HighlightingKind.Method, 0, 4, 7),
      ]);
    });

    it('should classify overload sets that agree and mark the rest as dependent', () => {
      const overload: Decl = { ...named('run'), kind: 'Method', isStatic: false };
      const result = walk('a.run(); a.mix();', [
        { shape: 'overloadRef', name: ident('run'), location: at(0, 2), candidates: [run, overload] },
        { shape: 'overloadRef', name: ident('mix'), location: at(0, 11), candidates: [run, count] },
      ]);
      expect(result.tokens).toEqual([
        token(HighlightingKind.Method, 0, 2, 5),
        token(HighlightingKind.DependentName, 0, 11, 14),
      ]);
    });

    it('should tell static and instance method references apart', () => {
      const create: Decl = { ...named('create'), kind: 'Method', isStatic: true };
      const result = walk('create(); run();', [
        { shape: 'declRef', name: ident('create'), location: at(0, 0), decl: create },
        { shape: 'declRef', name: ident('run'), location: at(0, 10), decl: run },
      ]);
      expect(result.tokens).toEqual([
        token(HighlightingKind.StaticMethod, 0, 0, 6),
        token(HighlightingKind.Method, 0, 10, 13),
      ]);
    });

    it('should emit dependent names that are written as identifiers', () => {
      const result = walk('x.size; t + u;', [
        { shape: 'dependentMemberAccess', name: ident('size'), location: at(0, 2) },
        { shape: 'dependentDeclRef', name: { kind: 'operator', text: 'operator+' }, location: at(0, 10) },
      ]);
      expect(result.tokens).toEqual([token(HighlightingKind.DependentName, 0, 2, 6)]);
    });

    it('should emit the member named by a constructor initializer', () => {
      const result = walk('Foo() : count(0) {}', [
        { shape: 'memberInitializer', location: at(0, 8), member: count },
        { shape: 'memberInitializer', location: at(0, 0) },
      ]);
      expect(result.tokens).toEqual([token(HighlightingKind.Field, 0, 8, 13)]);
    });
  });

  describe('type references', () => {
    it('should classify typedef references by their underlying type', () => {
      const alias: Decl = { ...named('Alias'), kind: 'Typedef', underlying: { kind: 'Tag', decl: foo } };
      expect(walk('Alias a;', [{ shape: 'typedefTypeRef', location: at(0, 0), decl: alias }]).tokens).toEqual([
        token(HighlightingKind.Class, 0, 0, 5),
      ]);
    });

    it('should classify template specializations through the template', () => {
      const vec: Decl = { ...named('Vec'), kind: 'Template', templated: foo };
      const result = walk('Vec<int> v; Tpl<int> w;', [
        { shape: 'templateSpecializationRef', location: at(0, 0), template: vec },
        { shape: 'templateSpecializationRef', location: at(0, 12) },
      ]);
      expect(result.tokens).toEqual([token(HighlightingKind.Class, 0, 0, 3)]);
    });

    it('should skip the defining occurrence of a tag type', () => {
      const result = walk('class Foo {}; Foo f;', [
        { shape: 'tagTypeRef', location: at(0, 6), type: { kind: 'Tag', decl: foo }, isDefinition: true },
        { shape: 'tagTypeRef', location: at(0, 14), type: { kind: 'Tag', decl: foo }, isDefinition: false },
      ]);
      expect(result.tokens).toEqual([token(HighlightingKind.Class, 0, 14, 17)]);
    });

    it('should classify decltype by the denoted type', () => {
      const result = walk('decltype(x) y;', [
        { shape: 'decltypeRef', location: at(0, 0), type: { kind: 'Builtin', name: 'int' } },
      ]);
      expect(result.tokens).toEqual([token(HighlightingKind.Primitive, 0, 0, 8)]);
    });

    it('should emit dependent types and template parameters', () => {
      const result = walk('typename T::type u; T t;', [
        { shape: 'dependentTypeRef', location: at(0, 12) },
        { shape: 'templateParameterTypeRef', location: at(0, 20) },
      ]);
      expect(result.tokens).toEqual([
        token(HighlightingKind.DependentType, 0, 12, 16),
        token(HighlightingKind.TemplateParameter, 0, 20, 21),
      ]);
    });

    it('should emit namespace qualifiers only', () => {
      const result = walk('std::x; Foo::y; ns::z;', [
        { shape: 'namespaceQualifier', location: at(0, 0), specifier: 'namespace' },
        { shape: 'namespaceQualifier', location: at(0, 8), specifier: 'type' },
        { shape: 'namespaceQualifier', location: at(0, 16), specifier: 'namespaceAlias' },
      ]);
      expect(result.tokens).toEqual([
        token(HighlightingKind.Namespace, 0, 0, 3),
        token(HighlightingKind.Namespace, 0, 16, 18),
      ]);
    });
  });

  describe('traversal', () => {
    it('should visit parents before children and siblings in order', () => {
      const x: Decl = { ...named('x', at(1, 4)), kind: 'Variable', storage: 'local' };
      const result = walk('class Foo {};\nFoo x;', [
        {
          shape: 'declaration',
          decl: x,
          children: [
            { shape: 'tagTypeRef', location: at(1, 0), type: { kind: 'Tag', decl: foo }, isDefinition: false },
          ],
        },
        { shape: 'declaration', decl: foo },
      ]);
      expect(result.tokens).toEqual([
        token(HighlightingKind.LocalVariable, 1, 4, 5),
        token(HighlightingKind.Class, 1, 0, 3),
        token(HighlightingKind.Class, 0, 6, 9),
      ]);
    });

    it('should walk very deep trees', () => {
      const x: Decl = { ...named('x'), kind: 'Variable', storage: 'local' };
      let node: TreeNode = { shape: 'declRef', name: ident('x'), location: at(0, 0), decl: x };
      for (let depth = 1; depth < 20000; depth++) {
        node = { shape: 'declRef', name: ident('x'), location: at(0, 0), decl: x, children: [node] };
      }
      expect(walk('x', [node]).tokens).toHaveLength(20000);
    });
  });

  describe('locations', () => {
    it('should highlight names written as macro arguments at their spelling', () => {
      const location: MacroLocation = { kind: 'macro', argument: true, spelling: at(0, 4) };
      const result = walk('DEF(Foo);', [{ shape: 'declRef', name: ident('Foo'), location, decl: foo }]);
      expect(result.tokens).toEqual([token(HighlightingKind.Class, 0, 4, 7)]);
    });

    it('should skip names produced by a macro body', () => {
      const location: MacroLocation = { kind: 'macro', argument: false, spelling: at(0, 0) };
      const result = walk('DEF();', [{ shape: 'declRef', name: ident('Foo'), location, decl: foo }]);
      expect(result.tokens).toEqual([]);
      expect(result.diagnostics).toEqual([]);
    });

    it('should skip locations outside the main file', () => {
      const result = walk('Foo f;', [
        { shape: 'declRef', name: ident('Foo'), location: at(0, 0, 'other.h'), decl: foo },
      ]);
      expect(result.tokens).toEqual([]);
      expect(result.diagnostics).toEqual([]);
    });

    it('should skip nodes without a location', () => {
      expect(walk('Foo f;', [{ shape: 'declRef', name: ident('Foo'), decl: foo }]).tokens).toEqual([]);
    });

    it('should report a diagnostic for locations that do not start a token', () => {
      const result = walk('Foo f;', [
        { shape: 'declRef', name: ident('Foo'), location: at(0, 3), decl: foo },
        { shape: 'declRef', name: ident('Foo'), location: at(4, 0), decl: foo },
      ]);
      expect(result.tokens).toEqual([]);
      expect(result.diagnostics).toEqual([
        { message: 'Tried to add semantic token with an invalid range', location: at(0, 3) },
        { message: 'Tried to add semantic token with an invalid range', location: at(4, 0) },
      ]);
    });
  });
});
