/** Manifest file looked up in the working directory. */
export const MANIFEST_FILE_NAME = 'pyproject.toml'

/** Tag prefix for normal releases. */
export const RELEASE_TAG_PREFIX = 'v'

/** Tag prefix for pre-releases and test runs. */
export const TEST_TAG_PREFIX = 'test-'
