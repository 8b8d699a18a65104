/***
 *
 *
 *  Network Configuration Scripts
 *
 *  Ion scripts installed into /bin that talk to the netcfg scheme, and the
 *  init scripts that run them at boot.
 *
 */

import type { Interface, InitScript, SystemConfig } from "../types/modules"
import { sortedEntries } from "../config/plan"

export function netmaskToPrefix(netmask: string): number {
    return netmask
        .split(".")
        .map(octet => Number.parseInt(octet, 10))
        .reduce((bits, octet) => bits + octet.toString(2).split("").filter(bit => bit === "1").length, 0)
}

/**
 * First configured interface, by name
 */
export function firstInterface(config: SystemConfig): { name: string, iface: Interface } | null {
    const first = sortedEntries(config.networking.interfaces)[0]
    return first ? { name: first[0], iface: first[1] } : null
}

export const NETCFG_CH_SCRIPT = function(): string {
    return `#!/bin/ion
echo "Configuring network for Cloud Hypervisor..."
if not exists -f /scheme/netcfg/ifaces/eth0/mac
    echo "Error: eth0 not found"
    exit 1
end
let ip = $(/bin/cat /etc/net/cloud-hypervisor/ip)
let gateway = $(/bin/cat /etc/net/cloud-hypervisor/gateway)
echo "$ip/24" > /scheme/netcfg/ifaces/eth0/addr/set
echo "default via $gateway" > /scheme/netcfg/route/add
echo "1.1.1.1" > /scheme/netcfg/resolv/nameserver
echo "Network configured: $ip/24 via $gateway"
`
}

export const NETCFG_AUTO_SCRIPT = function(): string {
    return `#!/bin/ion
let i:int = 0
while test $i -lt 30
    if exists -f /scheme/netcfg/ifaces/eth0/mac
        break
    end
    let i += 1
end
if not exists -f /scheme/netcfg/ifaces/eth0/mac
    echo "netcfg-auto: eth0 not found"
    exit 0
end
echo "netcfg-auto: Waiting for DHCP..."
let has_network = 0
let check:int = 0
while test $check -lt 15
    let wait:int = 0
    while test $wait -lt 500000
        let wait += 1
    end
    let ip_content = $(/bin/cat /scheme/netcfg/ifaces/eth0/addr/list 2>/dev/null)
    if not test "$ip_content" = ""
        echo "netcfg-auto: DHCP configured: $ip_content"
        let has_network = 1
        break
    end
    let check += 1
end
if test $has_network -eq 0
    if exists -f /etc/net/cloud-hypervisor/ip
        echo "netcfg-auto: No DHCP, applying static..."
        let ip = $(/bin/cat /etc/net/cloud-hypervisor/ip)
        let gateway = $(/bin/cat /etc/net/cloud-hypervisor/gateway)
        echo "$ip/24" > /scheme/netcfg/ifaces/eth0/addr/set
        echo "default via $gateway" > /scheme/netcfg/route/add
        echo "1.1.1.1" > /scheme/netcfg/resolv/nameserver
        echo "netcfg-auto: Static config applied ($ip)"
    else
        echo "netcfg-auto: No static config available"
    end
end
`
}

export const NETCFG_STATIC_SCRIPT = function(config: SystemConfig): string {
    const first = firstInterface(config)
    if (!first) {
        return `#!/bin/ion
echo "netcfg-static: No interfaces configured"
`
    }

    const { address, netmask, gateway } = first.iface
    const nameserver = config.networking.dns[0] ?? "1.1.1.1"

    return `#!/bin/ion
echo "netcfg-static: Configuring..."
let i:int = 0
while test $i -lt 30
    if exists -f /scheme/netcfg/ifaces/eth0/mac
        break
    end
    let i += 1
end
if not exists -f /scheme/netcfg/ifaces/eth0/mac
    echo "netcfg-static: eth0 not found"
    exit 1
end
echo "${address}/${netmaskToPrefix(netmask)}" > /scheme/netcfg/ifaces/eth0/addr/set
echo "default via ${gateway}" > /scheme/netcfg/route/add
echo "${nameserver}" > /scheme/netcfg/resolv/nameserver
echo "netcfg-static: Network ready (${address})"
/bin/ping -c 1 ${gateway}
`
}

export const DHCPD_QUIET_SCRIPT = "#!/bin/ion\n/bin/dhcpd -v eth0 > /var/log/dhcpd.log\n"
export const NETCFG_AUTO_QUIET_SCRIPT = "#!/bin/ion\n/bin/netcfg-auto > /var/log/netcfg.log\n"

/**
 * Init scripts contributed by the networking module, keyed by script name
 */
export function networkInitScripts(config: SystemConfig): Record<string, InitScript> {
    const { networking } = config
    const scripts: Record<string, InitScript> = {}
    if (!networking.enable) return scripts

    scripts["10_net"] = { text: "notify /bin/smolnetd", directory: "init.d" }

    if (networking.mode === "dhcp" || networking.mode === "auto") {
        scripts["15_dhcp"] = {
            text: "echo \"Starting DHCP client...\"\nnowait /bin/dhcpd-quiet",
            directory: "init.d",
        }
    }

    if (networking.mode === "auto") {
        scripts["16_netcfg"] = {
            text: "echo \"Running network auto-configuration...\"\nnowait /bin/netcfg-auto-quiet",
            directory: "init.d",
        }
    }

    const first = firstInterface(config)
    if (networking.mode === "static" && first) {
        scripts["15_netcfg"] = {
            text: `echo "Applying static network configuration (${first.name} ${first.iface.address} via ${first.iface.gateway})..."\n/bin/netcfg-static`,
            directory: "init.d",
        }
    }

    if (networking.remoteShellEnable) {
        const port = networking.remoteShellPort
        scripts["17_remote_shell"] = {
            text: `echo "Starting remote shell on port ${port}..."\nnowait /bin/nc -l -e /bin/sh 0.0.0.0:${port}`,
            directory: "init.d",
        }
    }

    return scripts
}
