const MAGNET_PREFIX = 'magnet:?';
const EXACT_TOPIC = /(?:^|&)xt=urn:(?:btih|btmh):[0-9a-z]+/i;

/** True for `magnet:?` URIs that carry a BitTorrent exact topic. */
export function isMagnetUri(source: string): boolean {
    if (!source.startsWith(MAGNET_PREFIX)) return false;
    return EXACT_TOPIC.test(source.slice(MAGNET_PREFIX.length));
}
