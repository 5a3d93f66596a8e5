export type ClaimValue =
	| string
	| number
	| boolean
	| null
	| readonly ClaimValue[]
	| { readonly [key: string]: ClaimValue };

export type CustomClaims = Readonly<Record<string, ClaimValue>>;

export interface StandardClaims {
	readonly aud: readonly string[];
	readonly sub: string;
	readonly iat: number;
	readonly exp: number;
}

export type TokenClaims = StandardClaims & CustomClaims;

export type ProtectedHeaders = Readonly<Record<string, ClaimValue>>;
