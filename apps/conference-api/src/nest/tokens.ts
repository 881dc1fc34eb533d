export const CONFERENCE_API_CONFIG = 'CONFERENCE_API_CONFIG'
export const CONFERENCE_API_REPOSITORIES = 'CONFERENCE_API_REPOSITORIES'
export const CONFERENCE_API_AUTHENTICATOR = 'CONFERENCE_API_AUTHENTICATOR'
export const CONFERENCE_API_LOGGER = 'CONFERENCE_API_LOGGER'
export const CONFERENCE_API_METRICS = 'CONFERENCE_API_METRICS'
