/**
 * Parser Types
 */

export type TokenType =
    | 'ATOM'          // sunny, stay_home, James_passed_CM1234
    | 'NOT'           // ~
    | 'IMPLIES'       // :-
    | 'COMMA'         // ,
    | 'DOT'           // .
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
