import { GetScopesUseCase } from './GetScopesUseCase';

describe('GetScopesUseCase', () => {
  it('should pair kind names with scopes by ordinal', () => {
    const { kinds, scopes } = new GetScopesUseCase().execute();

    expect(kinds).toHaveLength(18);
    expect(scopes).toHaveLength(18);
    expect(kinds[0]).toBe('Variable');
    expect(scopes[0]).toEqual(['variable.other.cpp']);
    expect(kinds[17]).toBe('Macro');
    expect(scopes[17]).toEqual(['entity.name.function.preprocessor.cpp']);
  });
});
