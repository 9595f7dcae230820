import type { BumpResult } from '../../types/bump-result'
import type { TagSpec } from '../../types/tag-spec'

import { RELEASE_TAG_PREFIX, TEST_TAG_PREFIX } from '../constants'
import { renderVersion } from '../versions/render-version'
import { isPreRelease } from '../versions/is-pre-release'

/**
 * Derive the commit message and tag name for a bump.
 *
 * Pre-releases and test runs are tagged `test-<version>`, everything else
 * `v<version>`.
 *
 * @param result - Bump result.
 * @param testMode - Force the `test-` prefix.
 * @returns Commit message and tag name.
 */
export function nameArtifacts(result: BumpResult, testMode: boolean): TagSpec {
  let version = renderVersion(result.next)
  let prefix =
    testMode || isPreRelease(result.next) ? TEST_TAG_PREFIX : RELEASE_TAG_PREFIX

  return {
    tagName: `${prefix}${version}`,
    commitMessage: version,
  }
}
