/**
 * Candidate profile collected at intake. Frozen once a session starts.
 */
export interface CandidateProfile {
    fullName: string;
    email: string;
    phone: string;
    yearsOfExperience: number;
    desiredPosition: string;
    location: string;
    techStack: string[];
}

/**
 * Profile draft in the fixed seven-key shape a resume parse produces and
 * the report exports.
 */
export interface CandidateInfoRecord {
    'Full Name': string;
    'Email': string;
    'Phone': string;
    'Years of Experience': number;
    'Desired Position': string;
    'Location': string;
    'Tech Stack': string[];
}

export type InterviewPersona = 'Default' | 'Expert' | 'Creative' | 'Analytical';

export interface ResumeConsistency {
    score: number;
    findings: string[];
}

export function toCandidateInfoRecord(profile: CandidateProfile): CandidateInfoRecord {
    return {
        'Full Name': profile.fullName,
        'Email': profile.email,
        'Phone': profile.phone,
        'Years of Experience': profile.yearsOfExperience,
        'Desired Position': profile.desiredPosition,
        'Location': profile.location,
        'Tech Stack': [...profile.techStack]
    };
}

export function fromCandidateInfoRecord(record: CandidateInfoRecord): CandidateProfile {
    return {
        fullName: record['Full Name'],
        email: record['Email'],
        phone: record['Phone'],
        yearsOfExperience: record['Years of Experience'],
        desiredPosition: record['Desired Position'],
        location: record['Location'],
        techStack: [...record['Tech Stack']]
    };
}

/** Raw intake as submitted; normalized into a CandidateProfile on start. */
export interface CandidateIntake extends Omit<CandidateProfile, 'techStack'> {
    techStack: string | string[];
}
