/**
 * Parser Types
 */

export type TokenType =
    | 'IDENT'         // Robert, T1, x, Missile
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'COMMA'         // ,
    | 'AND'           // &
    | 'ARROW'         // =>
    | 'QUERY'         // ?
    | 'DOT'           // .
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
