import { KnowledgeBase, Literal, Clause, Rule, take, isLogicException } from '../src/lib.js';

describe('Library Export', () => {
    test('builds a knowledge base from objects and lists arguments', () => {
        const sunny = new Literal('sunny');
        const stayHome = new Literal('stay_home');
        const happy = new Literal('happy');
        const kb = KnowledgeBase.from({
            kind: 'objects',
            statements: [Clause.of(sunny, stayHome), Rule.of(happy, stayHome)],
        });

        const [argument] = take(kb.arguments(happy), 1);
        expect(argument.toString()).toBe('({happy :- stay_home. stay_home, sunny.}, happy)');
    });

    test('exposes error guards', () => {
        try {
            KnowledgeBase.fromText('a :- .');
            throw new Error('expected a syntax error');
        } catch (e) {
            expect(isLogicException(e, 'SYNTAX_ERROR')).toBe(true);
        }
    });
});
