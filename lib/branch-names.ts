import { normalizeText } from './text';

interface BranchRule {
    name: string;
    matches(normalized: string, tokens: ReadonlySet<string>): boolean;
}

// First match wins, so "computer" outranks the IT rule for "Computer Science & IT"
const BRANCH_RULES: readonly BranchRule[] = [
    { name: 'Computer Engineering', matches: (text) => text.includes('computer') },
    {
        name: 'Information Technology',
        matches: (text, tokens) => text.includes('information technology') || tokens.has('it'),
    },
    {
        name: 'Electronics and Telecommunication Engineering',
        matches: (text, tokens) =>
            (text.includes('electronics') && text.includes('telecommunication')) || tokens.has('entc') || tokens.has('extc'),
    },
    { name: 'Mechanical Engineering', matches: (text) => text.includes('mechanical') },
    { name: 'Civil Engineering', matches: (text) => text.includes('civil') },
    { name: 'Electrical Engineering', matches: (text) => text.includes('electrical') },
];

function titleCase(text: string): string {
    return text
        .trim()
        .split(/\s+/)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
}

/**
 * Map scraper spellings ("Computer Engg.", "IT", "EXTC") onto one branch name.
 * Unknown branches are title-cased.
 */
export function standardizeBranchName(branch: string): string {
    const normalized = normalizeText(branch);
    const tokens = new Set(normalized.split(' '));

    const rule = BRANCH_RULES.find((candidate) => candidate.matches(normalized, tokens));
    return rule ? rule.name : titleCase(branch);
}
