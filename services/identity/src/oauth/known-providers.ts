export const KNOWN_PROVIDERS: readonly string[] = ['google', 'facebook', 'github', 'apple'];
